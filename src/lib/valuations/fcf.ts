export type StatementCell = { end: string; val: number | null };

export type StatementRow = {
  label: string;
  values: StatementCell[];
};

export type LineItem = {
  label: string;
  end: string;
  val: number;
};

export type FcfKeywords = {
  operatingCashFlow: string[];
  capitalExpenditure: string[];
};

// Tried in order; the first keyword that matches any row wins.
export const DEFAULT_FCF_KEYWORDS: FcfKeywords = {
  operatingCashFlow: [
    "operating cash flow",
    "cash flow from operating activities",
    "cash provided by operating activities",
    "provided by (used in) operating activities",
    "operating activities",
  ],
  capitalExpenditure: [
    "capital expenditure",
    "capex",
    "purchase of property",
    "purchases of property",
    "acquire property, plant",
  ],
};

function normalizeLabel(s: string): string {
  return s.trim().toLowerCase().replace(/\s+/g, " ");
}

function mostRecent(values: StatementCell[]): StatementCell | null {
  let best: StatementCell | null = null;
  for (const c of values) {
    if (!c || typeof c.end !== "string") continue;
    if (best === null || c.end > best.end) best = c;
  }
  return best;
}

/**
 * First row whose label contains one of the keywords (case-folded), trying
 * keywords in priority order. Returns that row's most recent column, or null
 * when nothing matches or the most recent value is missing.
 */
export function findLineItem(rows: StatementRow[], keywords: string[]): LineItem | null {
  const normalized = rows.map((row) => ({ row, label: normalizeLabel(row.label) }));

  for (const kw of keywords) {
    const needle = normalizeLabel(kw);
    if (!needle) continue;

    const hit = normalized.find((r) => r.label.includes(needle));
    if (!hit) continue;

    const cell = mostRecent(hit.row.values);
    if (!cell || typeof cell.val !== "number" || !Number.isFinite(cell.val)) return null;
    return { label: hit.row.label, end: cell.end, val: cell.val };
  }
  return null;
}

export type FcfDerivation = {
  fcf: number;
  operatingCashFlow: LineItem;
  capitalExpenditure: LineItem;
};

export function deriveFcfDetailed(
  rows: StatementRow[],
  keywords: FcfKeywords = DEFAULT_FCF_KEYWORDS
): FcfDerivation | null {
  const operatingCashFlow = findLineItem(rows, keywords.operatingCashFlow);
  const capitalExpenditure = findLineItem(rows, keywords.capitalExpenditure);
  if (!operatingCashFlow || !capitalExpenditure) return null;

  // capex rows already carry the outflow as a negative number
  return {
    fcf: operatingCashFlow.val + capitalExpenditure.val,
    operatingCashFlow,
    capitalExpenditure,
  };
}

/** Free cash flow = operating cash flow + capital expenditure, or null when either line is unavailable. */
export function deriveFcf(rows: StatementRow[], keywords: FcfKeywords = DEFAULT_FCF_KEYWORDS): number | null {
  return deriveFcfDetailed(rows, keywords)?.fcf ?? null;
}
