/**
 * Validates airport reference records before any stage sees them.
 * Invalid records and repeated codes are skipped with a warning; the first record of a code wins.
 */

import { AirportSchema } from "@/domain/airport/airport.schema";
import type { Airport } from "@/domain/airport/airport.schema";
import { dwarn } from "@/lib/debug";

export type PreparedAirports = {
  airports: Airport[];
  warnings: string[];
};

function labelOf(raw: unknown, index: number): string {
  if (typeof raw === "object" && raw !== null && "code" in raw && typeof raw.code === "string" && raw.code) {
    return raw.code;
  }
  return `airport #${index}`;
}

export function prepareAirports(raw: readonly unknown[]): PreparedAirports {
  const airports: Airport[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();

  raw.forEach((entry, index) => {
    const parsed = AirportSchema.safeParse(entry);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      warnings.push(`[${labelOf(entry, index)}] invalid airport (${detail}), skipped`);
      return;
    }
    const airport = parsed.data;
    if (seen.has(airport.code)) {
      warnings.push(`[${airport.code}] duplicate airport code, later record skipped`);
      return;
    }
    seen.add(airport.code);
    airports.push(airport);
  });

  for (const w of warnings) dwarn(`[pipeline] ${w}`);
  return { airports, warnings };
}
