/**
 * Natural-language deadline parser.
 *
 * Ordered pattern match over a normalized description. Pure and total:
 * an unrecognized phrase yields a `non_computable` rule, never an exception,
 * and the same description always parses to the same frequency and rule.
 */

import type { DeadlineRule, Frequency } from '../requirements/index.js'
import { makeDate } from './calendar.js'

export interface ParsedDeadline {
  frequency: Frequency
  rule: DeadlineRule
}

// ── Text normalization ──

const CARDINALS = new Map<string, number>(Object.entries({
  one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
  eleven: 11, twelve: 12, thirteen: 13, fourteen: 14, fifteen: 15, sixteen: 16,
  seventeen: 17, eighteen: 18, nineteen: 19, twenty: 20, thirty: 30, forty: 40,
  fifty: 50, sixty: 60, seventy: 70, eighty: 80, ninety: 90,
}))

const ORDINALS = new Map<string, number>(Object.entries({
  first: 1, second: 2, third: 3, fourth: 4, fifth: 5, sixth: 6, seventh: 7, eighth: 8,
  ninth: 9, tenth: 10, eleventh: 11, twelfth: 12, thirteenth: 13, fourteenth: 14,
  fifteenth: 15, sixteenth: 16, seventeenth: 17, eighteenth: 18, nineteenth: 19,
  twentieth: 20, thirtieth: 30,
}))

const MONTHS = new Map<string, number>(Object.entries({
  jan: 1, january: 1, feb: 2, february: 2, mar: 3, march: 3, apr: 4, april: 4, may: 5,
  jun: 6, june: 6, jul: 7, july: 7, aug: 8, august: 8, sep: 9, sept: 9, september: 9,
  oct: 10, october: 10, nov: 11, november: 11, dec: 12, december: 12,
}))

const MONTH_RE = '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)'

/** ["forty", "five"] → 45, ["one", "hundred", "twenty"] → 120; any unknown word → null. */
function wordsToNumber(words: readonly string[]): number | null {
  if (words.length === 0) return null
  let value = 0
  for (const [i, word] of words.entries()) {
    if (word === 'and' && i > 0) continue
    if (word === 'hundred') {
      value = (value === 0 ? 1 : value) * 100
      continue
    }
    const n = CARDINALS.get(word) ?? ORDINALS.get(word)
    if (n === undefined) return null
    value += n
  }
  return value
}

/**
 * Replace the longest trailing run of number words in `phrase` with `digits`.
 * "within forty-five" → "within 45"; a phrase with no trailing number is unchanged.
 */
function replaceTrailingNumber(phrase: string, digits: (n: number) => string): string {
  const starts = [0]
  for (let i = 0; i < phrase.length; i++) {
    if (phrase[i] === ' ' || phrase[i] === '-') starts.push(i + 1)
  }
  for (const start of starts) {
    const n = wordsToNumber(phrase.slice(start).split(/[- ]/))
    if (n !== null) return phrase.slice(0, start) + digits(n)
  }
  return phrase
}

const PHRASE = '(?:[a-z]+[- ]){0,3}[a-z]+'

/**
 * Lowercase, collapse whitespace and turn spelled-out numbers into digits:
 * "forty-five (45) days" → "45 days", "fifteenth day of" → "15 day of".
 */
export function normalizeDeadlineText(description: string): string {
  let t = description
    .toLowerCase()
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/\s+/g, ' ')
    .trim()

  // Legal drafting repeats the number in parentheses; keep the digits.
  t = t.replace(
    new RegExp(`\\b(${PHRASE})\\s*\\((\\d+)(st|nd|rd|th)?\\)`, 'g'),
    (match: string, phrase: string, digits: string, suffix: string | undefined) => {
      const replaced = replaceTrailingNumber(phrase, () => digits + (suffix ?? ''))
      return replaced === phrase ? match : replaced
    },
  )

  t = t.replace(new RegExp(`\\b${PHRASE}(?= (?:calendar |business )?days?\\b)`, 'g'), (phrase: string) =>
    replaceTrailingNumber(phrase, (n) => String(n)),
  )

  return t
}

// ── Event classification ──

function cleanEvent(raw: string): string {
  const clause = raw.split(/[.;,(]/)[0] ?? ''
  return clause.replace(/^(?:the|a|an)\s+/, '').trim().slice(0, 120)
}

const RECURRING_EVENT_RE = /\b(?:each|every|any|all)\b/

function afterEventRule(days: number, rawEvent: string): ParsedDeadline {
  const event = cleanEvent(rawEvent)
  if (/\bquarter(?:ly)?\b/.test(event)) {
    return { frequency: 'quarterly', rule: { kind: 'days_after_period_end', period: 'quarter', days } }
  }
  if (/\b(?:fiscal\s+)?year\b|\bannual\b/.test(event)) {
    return { frequency: 'annually', rule: { kind: 'days_after_period_end', period: 'year', days } }
  }
  if (/\bmonth\b/.test(event)) {
    return { frequency: 'monthly', rule: { kind: 'days_after_period_end', period: 'month', days } }
  }
  if (event.length === 0) return nonComputable('missing_event')
  if (RECURRING_EVENT_RE.test(event)) {
    return { frequency: 'custom', rule: { kind: 'non_computable', reason: 'recurring_event', event, days } }
  }
  return { frequency: 'one_time', rule: { kind: 'days_after_event', event, days, eventDate: null } }
}

function beforeEventRule(days: number, rawEvent: string): ParsedDeadline {
  const event = cleanEvent(rawEvent)
  if (event.length === 0) return nonComputable('missing_event')
  if (RECURRING_EVENT_RE.test(event)) {
    return { frequency: 'custom', rule: { kind: 'non_computable', reason: 'recurring_event', event, days } }
  }
  return { frequency: 'one_time', rule: { kind: 'days_before_event', event, days, eventDate: null } }
}

function nonComputable(reason: string): ParsedDeadline {
  return { frequency: 'custom', rule: { kind: 'non_computable', reason } }
}

// ── Patterns ──

const MAX_OFFSET_DAYS = 3660

const DAYS = '(\\d+)\\s*(?:calendar\\s+|business\\s+)?days?'

const AFTER_EVENT_RE = new RegExp(`${DAYS}\\s+(?:after|following|from)\\s+(.+)$`)
const BEFORE_EVENT_RE = new RegExp(`${DAYS}\\s+(?:before|prior\\s+to|preceding)\\s+(.+)$`)
const DAY_OF_MONTH_RE = /\b(\d{1,2})(?:st|nd|rd|th)?\s+(?:calendar\s+)?(?:day\s+)?of\s+(?:each|every)\s+(?:calendar\s+)?month\b/
const QUARTERLY_RE = /\bquarterly\b|\b(?:each|every|per)\s+(?:fiscal\s+|calendar\s+)?quarter\b/
const ANY_DAYS_RE = new RegExp(DAYS)
const ANNUAL_MARKER_RE = /\bannually\b|\byearly\b|\bannual\b|\b(?:each|every|per)\s+(?:fiscal\s+|calendar\s+)?year\b/
const MONTHLY_MARKER_RE = /\bmonthly\b|\b(?:each|every|per)\s+(?:calendar\s+)?month\b/
const MONTH_DAY_YEAR_RE = new RegExp(`\\b${MONTH_RE}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`)
const MONTH_DAY_RE = new RegExp(`\\b${MONTH_RE}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b`)
const ISO_DATE_RE = /\b(\d{4})-(\d{2})-(\d{2})\b/
const US_DATE_RE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/
const PRIOR_TO_RE = /\b(?:prior\s+to|before)\s+(.+)$/

function specificDate(year: number, month: number, day: number): ParsedDeadline | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null
  const date = makeDate(year, month, day)
  // makeDate clamps; a clamped date means the input was not a real day.
  if (Number(date.slice(8, 10)) !== day) return null
  return { frequency: 'one_time', rule: { kind: 'specific_date', date } }
}

/**
 * Parse a deadline description into frequency + rule.
 *
 * Order matters: offsets after an event win over bare frequency words, so
 * "45 days after each quarter ends" is quarterly with a 45-day offset.
 */
export function parseDeadlineDescription(description: string): ParsedDeadline {
  const parsed = matchDeadline(normalizeDeadlineText(description))
  if ('days' in parsed.rule && parsed.rule.days !== undefined && parsed.rule.days > MAX_OFFSET_DAYS) {
    return nonComputable('offset_out_of_range')
  }
  return parsed
}

function matchDeadline(t: string): ParsedDeadline {
  if (t.length === 0) return nonComputable('empty_description')

  const after = AFTER_EVENT_RE.exec(t)
  if (after) return afterEventRule(Number(after[1]), after[2])

  const before = BEFORE_EVENT_RE.exec(t)
  if (before) return beforeEventRule(Number(before[1]), before[2])

  const dom = DAY_OF_MONTH_RE.exec(t)
  if (dom) {
    const day = Number(dom[1])
    if (day >= 1 && day <= 31) {
      return { frequency: 'monthly', rule: { kind: 'day_of_month', day } }
    }
  }

  if (QUARTERLY_RE.test(t)) {
    const days = ANY_DAYS_RE.exec(t)
    return {
      frequency: 'quarterly',
      rule: { kind: 'days_after_period_end', period: 'quarter', days: days ? Number(days[1]) : 0 },
    }
  }

  const mdy = MONTH_DAY_YEAR_RE.exec(t)
  if (mdy) {
    const parsed = specificDate(Number(mdy[3]), MONTHS.get(mdy[1]) ?? 0, Number(mdy[2]))
    if (parsed) return parsed
  }
  const iso = ISO_DATE_RE.exec(t)
  if (iso) {
    const parsed = specificDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))
    if (parsed) return parsed
  }
  const us = US_DATE_RE.exec(t)
  if (us) {
    const parsed = specificDate(Number(us[3]), Number(us[1]), Number(us[2]))
    if (parsed) return parsed
  }

  if (ANNUAL_MARKER_RE.test(t)) {
    const md = MONTH_DAY_RE.exec(t)
    const month = md ? MONTHS.get(md[1]) : undefined
    const day = md ? Number(md[2]) : 0
    if (month !== undefined && day >= 1 && day <= 31) {
      return { frequency: 'annually', rule: { kind: 'fixed_annual_date', month, day } }
    }
    return { frequency: 'annually', rule: { kind: 'non_computable', reason: 'no_anchor' } }
  }

  if (MONTHLY_MARKER_RE.test(t)) {
    return { frequency: 'monthly', rule: { kind: 'non_computable', reason: 'no_anchor' } }
  }

  const prior = PRIOR_TO_RE.exec(t)
  if (prior) return beforeEventRule(0, prior[1])

  return nonComputable('unrecognized')
}
