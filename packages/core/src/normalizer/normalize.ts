/**
 * Raw candidates → validated, deduplicated requirements with stable ids.
 *
 * A bad candidate costs only itself: it is dropped and reported in
 * `warnings`, and the rest of the batch goes through.
 */

import { Ok, Err, ComplianceError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { parseDeadlineDescription, resolveDeadline } from '../deadlines/index.js'
import {
  createDeadline,
  createRequirement,
  type Deadline,
  type DeadlineRule,
  type Frequency,
  type Requirement,
  type Threshold,
} from '../requirements/index.js'
import { RawCandidateSchema, type RawCandidate, type RawDeadline } from './candidate.js'
import { DEFAULT_CATEGORY_RULES, matchCategories, type CategoryRule } from './categories.js'
import { normalizeCategory, normalizeFrequency, normalizeSeverity } from './enums.js'
import { computeSeverity } from './severity.js'
import { detectMetric, normalizeRawThreshold, parseThreshold } from './threshold.js'

export interface NormalizationWarning {
  /** Position of the offending candidate in the input. */
  candidateIndex: number
  message: string
}

export interface NormalizationResult {
  requirements: Requirement[]
  warnings: NormalizationWarning[]
}

export interface NormalizerOptions {
  categoryRules?: readonly CategoryRule[]
}

const MAX_TITLE_CHARS = 80

function synthesizeTitle(description: string): string {
  const sentence = (description.split(/[.!?](?:\s|$)/)[0] ?? '').trim()
  if (sentence.length <= MAX_TITLE_CHARS) return sentence
  const cut = sentence.slice(0, MAX_TITLE_CHARS)
  const space = cut.lastIndexOf(' ')
  return space > MAX_TITLE_CHARS / 2 ? cut.slice(0, space) : cut
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? ''
  return trimmed.length > 0 ? trimmed : null
}

function asWholeNumber(value: number | null | undefined, min: number, max: number): number | null {
  if (value === undefined || value === null || !Number.isInteger(value)) return null
  return value >= min && value <= max ? value : null
}

const PERIOD_BY_FREQUENCY = { monthly: 'month', quarterly: 'quarter', annually: 'year' } as const

function hintRule(raw: RawDeadline, frequency: Frequency): DeadlineRule {
  const dayOfMonth = asWholeNumber(raw.day_of_month, 1, 31)
  if (frequency === 'monthly' && dayOfMonth !== null) {
    return { kind: 'day_of_month', day: dayOfMonth }
  }
  const offset = asWholeNumber(raw.days_after_period_end, 0, 3660)
  if (offset !== null && (frequency === 'monthly' || frequency === 'quarterly' || frequency === 'annually')) {
    return { kind: 'days_after_period_end', period: PERIOD_BY_FREQUENCY[frequency], days: offset }
  }
  return { kind: 'non_computable', reason: 'unparsed' }
}

function buildDeadline(raw: RawCandidate['deadline']): Deadline | null {
  if (raw === undefined || raw === null) return null

  let input: { description: string; frequency: Frequency; rule: DeadlineRule }
  if (typeof raw === 'string') {
    const description = nonEmpty(raw)
    if (description === null) return null
    input = { description, frequency: 'custom', rule: { kind: 'non_computable', reason: 'unparsed' } }
  } else {
    const description = nonEmpty(raw.description) ?? nonEmpty(raw.frequency)
    if (description === null) return null
    const frequency = normalizeFrequency(raw.frequency) ?? 'custom'
    input = { description, frequency, rule: hintRule(raw, frequency) }
  }

  const created = createDeadline(input)
  return created.ok ? resolveDeadline(created.value) : null
}

/** Timing stated only in prose; attached only when it parses to a computable rule. */
function inferDeadline(texts: readonly (string | null)[]): Deadline | null {
  for (const text of texts) {
    if (text === null) continue
    const parsed = parseDeadlineDescription(text)
    if (parsed.rule.kind === 'non_computable') continue
    const created = createDeadline({ description: text, frequency: parsed.frequency, rule: parsed.rule })
    if (created.ok) return created.value
  }
  return null
}

function buildThreshold(raw: RawCandidate, title: string, description: string, sourceText: string): Threshold | null {
  const contextMetric = detectMetric(title, description, sourceText)

  if (typeof raw.threshold === 'string') {
    const parsed = parseThreshold(raw.threshold, detectMetric(raw.threshold) ?? contextMetric ?? title)
    if (parsed) return parsed
  } else if (raw.threshold !== undefined && raw.threshold !== null) {
    const structured = normalizeRawThreshold(raw.threshold, contextMetric ?? title)
    if (structured) return structured
  }

  return parseThreshold(description, contextMetric) ?? parseThreshold(sourceText, contextMetric)
}

function buildRequirement(raw: RawCandidate, rules: readonly CategoryRule[]): Result<Requirement, ComplianceError> {
  const description = nonEmpty(raw.description)
  const givenTitle = nonEmpty(raw.title)
  if (givenTitle === null && description === null) {
    return Err(ComplianceError.normalization('Candidate has neither a title nor a description'))
  }
  const title = givenTitle ?? synthesizeTitle(description ?? '')
  const descriptionText = description ?? ''
  const sourceText = nonEmpty(raw.original_text) ?? nonEmpty(raw.source_text) ?? ''

  const signals = matchCategories([raw.category ?? '', title, descriptionText].join(' '), rules)
  const category = normalizeCategory(raw.category) ?? signals[0] ?? 'other'
  const deadline =
    buildDeadline(raw.deadline) ?? inferDeadline([description, nonEmpty(raw.plain_language_summary)])
  const threshold = buildThreshold(raw, title, descriptionText, sourceText)

  const severity = computeSeverity({
    category,
    signals,
    frequency: deadline?.frequency ?? null,
    hasThreshold: threshold !== null,
    guess: normalizeSeverity(raw.severity),
  })

  // Placeholder id; the real one is assigned after deduplication.
  const created = createRequirement({
    id: 'REQ-000',
    title,
    category,
    plainLanguageSummary: nonEmpty(raw.plain_language_summary) ?? description ?? title,
    sourceText,
    documentReference: nonEmpty(raw.document_reference) ?? '',
    deadline,
    threshold,
    severity,
    status: 'unknown',
    curePeriodDays: asWholeNumber(raw.cure_period_days, 0, Number.MAX_SAFE_INTEGER),
  })
  return created.ok
    ? Ok(created.value)
    : Err(ComplianceError.normalization(created.error.message))
}

function dedupKey(r: Requirement): string {
  return `${r.title.toLowerCase().replace(/\s+/g, ' ').trim()}|${r.category}`
}

/** Collapse duplicates onto the first-seen slot, keeping whichever has the longer source text. */
function deduplicate(requirements: readonly Requirement[]): Requirement[] {
  const slots: Requirement[] = []
  const slotByKey = new Map<string, number>()
  for (const r of requirements) {
    const key = dedupKey(r)
    const slot = slotByKey.get(key)
    if (slot === undefined) {
      slotByKey.set(key, slots.length)
      slots.push(r)
    } else if (r.sourceText.length > slots[slot].sourceText.length) {
      slots[slot] = r
    }
  }
  return slots
}

export function formatRequirementId(index: number): string {
  return `REQ-${String(index + 1).padStart(3, '0')}`
}

export function normalizeCandidates(
  candidates: readonly unknown[],
  options: NormalizerOptions = {},
): NormalizationResult {
  const rules = options.categoryRules ?? DEFAULT_CATEGORY_RULES
  const warnings: NormalizationWarning[] = []
  const built: Requirement[] = []

  candidates.forEach((candidate, candidateIndex) => {
    const parsed = RawCandidateSchema.safeParse(candidate)
    const result = parsed.success
      ? buildRequirement(parsed.data, rules)
      : Err(ComplianceError.normalization('Candidate is not an object'))
    if (result.ok) {
      built.push(result.value)
      return
    }
    console.warn(`[normalizer] Dropped candidate ${candidateIndex}: ${result.error.message}`)
    warnings.push({ candidateIndex, message: result.error.message })
  })

  const requirements = deduplicate(built).map((r, i) => ({ ...r, id: formatRequirementId(i) }))
  return { requirements, warnings }
}
