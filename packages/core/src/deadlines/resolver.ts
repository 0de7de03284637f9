import type { Deadline, Requirement } from '../requirements/index.js'
import { parseDeadlineDescription } from './parser.js'

/**
 * Re-derive a deadline's frequency and rule from its description.
 *
 * A computable parse wins. Otherwise a computable rule already on the
 * deadline (a structured hint carried from extraction) is kept. Failing both,
 * the parser's `non_computable` rule is used and the deadline keeps its
 * frequency unless the parser named a more specific one. Idempotent.
 */
export function resolveDeadline(deadline: Deadline): Deadline {
  const parsed = parseDeadlineDescription(deadline.description)
  if (parsed.rule.kind !== 'non_computable') {
    return { description: deadline.description, frequency: parsed.frequency, rule: parsed.rule }
  }
  if (deadline.rule.kind !== 'non_computable') return deadline
  return {
    description: deadline.description,
    frequency: parsed.frequency !== 'custom' ? parsed.frequency : deadline.frequency,
    rule: parsed.rule,
  }
}

export function resolveRequirementDeadline(requirement: Requirement): Requirement {
  if (requirement.deadline === null) return requirement
  return { ...requirement, deadline: resolveDeadline(requirement.deadline) }
}
