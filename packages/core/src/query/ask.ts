/**
 * Natural-language questions over a loan's requirements.
 *
 * This is heuristic lexical retrieval: questions and requirements are
 * compared by shared word tokens, not by meaning. A scorer with the same
 * signature can replace the default without changing callers.
 */

import type { LoanProfile, Requirement } from '../requirements/index.js'
import { compareRequirementIds } from './filter.js'

export type RequirementScorer = (question: string, requirement: Requirement) => number

export interface AskOptions {
  topK?: number
  /** Minimum score a requirement needs to be returned. */
  minScore?: number
  scorer?: RequirementScorer
}

export interface ScoredRequirement {
  requirement: Requirement
  score: number
}

export const DEFAULT_TOP_K = 5
export const DEFAULT_MIN_SCORE = 0.2

const STOPWORDS = new Set([
  'the', 'and', 'are', 'was', 'were', 'been', 'being', 'have', 'has', 'had',
  'does', 'did', 'will', 'would', 'could', 'should', 'may', 'might', 'shall',
  'can', 'for', 'with', 'from', 'into', 'about', 'any', 'all', 'each', 'what',
  'which', 'who', 'whom', 'when', 'where', 'how', 'why', 'this', 'that',
  'these', 'those', 'there', 'their', 'your', 'our', 'you', 'they', 'them',
  'not', 'but', 'need', 'must', 'tell', 'show', 'list', 'give', 'get',
])

function stem(word: string): string {
  if (word.length > 4 && word.endsWith('ies')) return `${word.slice(0, -3)}y`
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1)
  return word
}

/** Lowercased, stopword-free, plural-stripped word tokens. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 2 && !STOPWORDS.has(w))
    .map(stem)
}

/**
 * Share of distinct question tokens that appear in the requirement's
 * title, plain-language summary or category name. 0 when the question
 * has no usable tokens.
 */
export const lexicalOverlapScore: RequirementScorer = (question, requirement) => {
  const asked = new Set(tokenize(question))
  if (asked.size === 0) return 0
  const known = new Set(
    tokenize([requirement.title, requirement.plainLanguageSummary, requirement.category.replace(/_/g, ' ')].join(' ')),
  )
  let hits = 0
  for (const token of asked) {
    if (known.has(token)) hits++
  }
  return hits / asked.size
}

/** Top-K requirements at or above the score floor, best first, ties by id. */
export function askQuestion(profile: LoanProfile, question: string, options: AskOptions = {}): ScoredRequirement[] {
  const topK = options.topK ?? DEFAULT_TOP_K
  const minScore = options.minScore ?? DEFAULT_MIN_SCORE
  const scorer = options.scorer ?? lexicalOverlapScore
  if (question.trim().length === 0 || topK <= 0) return []

  return profile.requirements
    .map((requirement) => ({ requirement, score: scorer(question, requirement) }))
    .filter((s) => Number.isFinite(s.score) && s.score > 0 && s.score >= minScore)
    .sort((a, b) => b.score - a.score || compareRequirementIds(a.requirement, b.requirement))
    .slice(0, topK)
}
