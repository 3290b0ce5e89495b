export type DailyClose = { date: string; close: number };

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function columnIndex(header: string[], name: string): number | null {
  const idx = header.findIndex((h) => h.trim().toLowerCase() === name);
  return idx === -1 ? null : idx;
}

/**
 * Parses Stooq's daily CSV (Date,Open,High,Low,Close,Volume) into closes,
 * oldest first. Rows without an ISO date or a finite close are skipped; a body
 * without Date and Close columns (Stooq answers "No data" as plain text) gives
 * an empty history.
 */
export function parseStooqHistory(csvText: string): DailyClose[] {
  const [headerLine, ...body] = csvText.split(/\r?\n/).filter((l) => l.trim() !== "");
  if (headerLine === undefined) return [];

  const header = headerLine.split(",");
  const dateCol = columnIndex(header, "date");
  const closeCol = columnIndex(header, "close");
  if (dateCol === null || closeCol === null) return [];

  const rows = body.flatMap((line): DailyClose[] => {
    const cells = line.split(",");
    const date = cells[dateCol]?.trim() ?? "";
    const rawClose = cells[closeCol]?.trim() ?? "";
    const close = rawClose === "" ? NaN : Number(rawClose);
    return ISO_DATE.test(date) && Number.isFinite(close) ? [{ date, close }] : [];
  });

  return rows.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

// Per-process cache keyed by upper-cased ticker.
const stooqHistoryCache = new Map<string, { fetchedAt: number; rows: DailyClose[] }>();
const CACHE_TTL_MS = 15 * 60 * 1000;

export async function fetchStooqDailyHistory(ticker: string): Promise<DailyClose[]> {
  const key = ticker.toUpperCase();
  const cached = stooqHistoryCache.get(key);
  if (cached && Date.now() - cached.fetchedAt < CACHE_TTL_MS) return cached.rows;

  const stooqSymbol = `${ticker}.US`.toLowerCase();
  const url = `https://stooq.com/q/d/l/?s=${stooqSymbol}&i=d`;

  const res = await fetch(url, {
    headers: { "User-Agent": "Mozilla/5.0", Accept: "text/csv,*/*" },
    cache: "no-store",
  });

  const text = await res.text();
  if (!res.ok) throw new Error(`Stooq history failed: status=${res.status}. Body=${text.slice(0, 300)}`);

  const rows = parseStooqHistory(text);
  stooqHistoryCache.set(key, { fetchedAt: Date.now(), rows });
  return rows;
}

export function latestClose(history: DailyClose[]): DailyClose | null {
  return history.length ? history[history.length - 1] : null;
}
