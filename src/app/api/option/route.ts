import { NextResponse } from "next/server";
import { z } from "zod";

import { priceOption } from "@/lib/valuations/blackScholes";
import { isValuationFailure } from "@/lib/valuations/types";

export const runtime = "nodejs";

const QuerySchema = z.object({
  S: z.coerce.number().finite(),
  K: z.coerce.number().finite(),
  T: z.coerce.number().finite(),
  r: z.coerce.number().finite().default(0),
  sigma: z.coerce.number().finite(),
  kind: z.enum(["call", "put"]).default("call"),
});

function param(url: URL, key: string): string | undefined {
  const v = url.searchParams.get(key);
  return v === null || v.trim() === "" ? undefined : v;
}

export async function GET(req: Request) {
  const url = new URL(req.url);
  const parsed = QuerySchema.safeParse({
    S: param(url, "S"),
    K: param(url, "K"),
    T: param(url, "T"),
    r: param(url, "r"),
    sigma: param(url, "sigma"),
    kind: param(url, "kind"),
  });
  if (!parsed.success) {
    return NextResponse.json({ ok: false, error: "BAD_REQUEST", issues: parsed.error.issues }, { status: 400 });
  }

  const result = priceOption(parsed.data);
  if (isValuationFailure(result)) {
    return NextResponse.json({ ok: false, error: "INVALID_INPUT", details: result.error }, { status: 400 });
  }

  return NextResponse.json({ ok: true, quote: parsed.data, result, thetaUnit: "per_year" });
}
