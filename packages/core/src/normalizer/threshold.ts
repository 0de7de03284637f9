/**
 * Threshold extraction from explicit oracle output or free text.
 *
 * Free text yields a threshold only when a comparator, a number and a known
 * metric are all present; nothing is invented to fill a gap.
 */

import { createThreshold, type ComparisonOperator, type Threshold } from '../requirements/index.js'
import type { RawThreshold } from './candidate.js'

const COMPARATORS: ReadonlyArray<readonly [string, ComparisonOperator]> = [
  ['greater than or equal to', '>='],
  ['less than or equal to', '<='],
  ['not less than', '>='],
  ['no less than', '>='],
  ['at least', '>='],
  ['minimum of', '>='],
  ['not to exceed', '<='],
  ['not exceed', '<='],
  ['not more than', '<='],
  ['no more than', '<='],
  ['not greater than', '<='],
  ['no greater than', '<='],
  ['at most', '<='],
  ['maximum of', '<='],
  ['greater than', '>'],
  ['more than', '>'],
  ['in excess of', '>'],
  ['less than', '<'],
  ['below', '<'],
  ['equal to', '=='],
  ['>=', '>='],
  ['≥', '>='],
  ['<=', '<='],
  ['≤', '<='],
  ['>', '>'],
  ['<', '<'],
]

const OPERATOR_BY_PHRASE = new Map<string, ComparisonOperator>(COMPARATORS)

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const COMPARATOR_ALTERNATION = [...COMPARATORS]
  .map(([phrase]) => phrase)
  .sort((a, b) => b.length - a.length)
  .map(escapeRegExp)
  .join('|')

// comparator, optional "of", optional $, number, optional unit; offsets in days/months are not thresholds
const THRESHOLD_RE = new RegExp(
  `(?<![a-z])(${COMPARATOR_ALTERNATION})\\s*(?:of\\s+)?(\\$)?\\s*(\\d[\\d,]*(?:\\.\\d+)?)(?!\\d)(?!\\.\\d)` +
    `(?!\\s*(?:calendar\\s+|business\\s+)?(?:days?|months?|years?)\\b)` +
    `\\s*(x\\b|times\\b|%|percent\\b|:\\s*1(?:\\.0+)?\\b|to\\s+1(?:\\.0+)?\\b)?`,
)

const KNOWN_METRICS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bdscr\b|\bdebt service coverage\b/, 'DSCR'],
  [/\bltv\b|\bloan[- ]to[- ]value\b/, 'LTV'],
  [/\bdebt yield\b/, 'Debt Yield'],
  [/\bnet worth\b/, 'Net Worth'],
  [/\bliquidity\b/, 'Liquidity'],
  [/\boccupancy\b/, 'Occupancy'],
]

/** The first known metric named in any of the texts, checked in order. */
export function detectMetric(...texts: string[]): string | null {
  for (const text of texts) {
    const lower = text.toLowerCase()
    for (const [pattern, label] of KNOWN_METRICS) {
      if (pattern.test(lower)) return label
    }
  }
  return null
}

function normalizeUnit(raw: string | undefined, dollar: boolean): string | null {
  if (dollar) return '$'
  if (raw === undefined) return null
  const u = raw.trim().toLowerCase()
  if (u === 'x' || u === 'times' || u === 'ratio' || /^(?::\s*|to\s+)1(?:\.0+)?$/.test(u)) return 'x'
  if (u === '%' || u === 'percent') return '%'
  if (u === '$' || u === 'usd' || u === 'dollars') return '$'
  return u.length > 0 ? raw.trim() : null
}

/**
 * Scan text for "<comparator> <number><unit>". `metric` names the threshold;
 * when null, a known metric must appear in `text` or no threshold is returned.
 */
export function parseThreshold(text: string, metric: string | null = null): Threshold | null {
  const lower = text.toLowerCase()
  const match = THRESHOLD_RE.exec(lower)
  if (!match) return null

  const resolvedMetric = metric ?? detectMetric(lower)
  if (resolvedMetric === null) return null

  const operator = OPERATOR_BY_PHRASE.get(match[1])
  if (operator === undefined) return null

  const result = createThreshold({
    metric: resolvedMetric,
    operator,
    value: Number(match[3].replace(/,/g, '')),
    unit: normalizeUnit(match[4], match[2] !== undefined),
  })
  return result.ok ? result.value : null
}

const OPERATOR_ALIASES: Record<string, ComparisonOperator> = {
  '>=': '>=',
  '=>': '>=',
  '≥': '>=',
  '<=': '<=',
  '=<': '<=',
  '≤': '<=',
  '>': '>',
  '<': '<',
  '==': '==',
  '=': '==',
}

/** Validate a structured threshold from the oracle; metric falls back to `fallbackMetric`. */
export function normalizeRawThreshold(raw: RawThreshold, fallbackMetric: string): Threshold | null {
  if (raw.value === undefined || raw.value === null) return null
  const op = raw.operator?.trim() ?? '>='
  if (!Object.hasOwn(OPERATOR_ALIASES, op)) return null

  const result = createThreshold({
    metric: raw.metric !== undefined && raw.metric.trim().length > 0 ? raw.metric : fallbackMetric,
    operator: OPERATOR_ALIASES[op],
    value: raw.value,
    unit: normalizeUnit(raw.unit, false),
  })
  return result.ok ? result.value : null
}
