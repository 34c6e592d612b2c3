import { buildIsoDate, yearOf } from "@/lib/utils/dates";
import { clampDays } from "./normalizer";
import type { DatasetFacts, TimeChoice } from "./types";

// Date token: 2017-12-03, 2017/12/3, 2017.12.3, or a bare 12/3 (year taken from the dataset).
const DATE_TOKEN = String.raw`(?:(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})|(\d{1,2})/(\d{1,2}))`;

const RANGE_PATTERN = new RegExp(
  String.raw`(\bfrom\s+|\bbetween\s+)?${DATE_TOKEN}\s*(?:to|through|until|and|~|–|-)\s*${DATE_TOKEN}`,
  "i"
);
const ISO_DATE_PATTERN = /(?<![\d/.-])(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?![\d/.-])/;
// A bare m/d reads as a fraction ("by 1/2") unless a date preposition leads it.
const SHORT_DATE_PATTERN = /\b(?:on|since|before|after|until|till)\s+(\d{1,2})\/(\d{1,2})(?![\d/.-])/i;
const LAST_N_PATTERN = /\b(?:last|past|previous|recent)\s+(\d+)\s+days?\b/i;
const LAST_WEEK_PATTERN = /\b(?:last|past|previous)\s+week\b/i;

function readDate(groups: (string | undefined)[], facts: DatasetFacts): string | null {
  const [year, month, day, shortMonth, shortDay] = groups;
  if (year && month && day) {
    return buildIsoDate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
  }
  if (shortMonth && shortDay) {
    return buildIsoDate(yearOf(facts.maxDate), parseInt(shortMonth, 10), parseInt(shortDay, 10));
  }
  return null;
}

/**
 * Finds an explicit time expression in the user's question. A range wins over a single
 * date found inside it; a date wins over a relative lookback. A range of two bare m/d
 * tokens needs a leading "from" or "between". Returns null when the text names no time
 * at all, or only an impossible date.
 */
export function extractTimeSignal(question: string, facts: DatasetFacts): TimeChoice | null {
  const range = question.match(RANGE_PATTERN);
  if (range) {
    const [, lead, ...groups] = range;
    const bothBare = !groups[0] && !groups[5];
    const start = readDate(groups.slice(0, 5), facts);
    const end = readDate(groups.slice(5, 10), facts);
    if (start && end && (lead || !bothBare)) return { mode: "range", start, end };
  }

  const iso = question.match(ISO_DATE_PATTERN);
  if (iso) {
    const dt = readDate([iso[1], iso[2], iso[3]], facts);
    if (dt) return { mode: "day", dt };
  }

  const short = question.match(SHORT_DATE_PATTERN);
  if (short) {
    const dt = readDate([undefined, undefined, undefined, short[1], short[2]], facts);
    if (dt) return { mode: "day", dt };
  }

  const lastN = question.match(LAST_N_PATTERN);
  if (lastN) {
    return { mode: "days", days: clampDays(parseInt(lastN[1], 10)) };
  }

  if (LAST_WEEK_PATTERN.test(question)) {
    return { mode: "days", days: 7 };
  }

  return null;
}
