/**
 * Boundary-aware document chunker.
 * Packs paragraphs into chunks up to a character budget, falls back to
 * sentence boundaries for long paragraphs, and hard-splits (with overlap)
 * only a single sentence that is itself over budget.
 */

import { createHash } from 'node:crypto'

export interface ChunkerOptions {
  maxChunkChars?: number
  /** Overlap between the pieces of a hard split. */
  overlapChars?: number
}

export interface DocumentChunk {
  chunkIndex: number
  content: string
  contentHash: string
  charCount: number
}

export const DEFAULT_MAX_CHUNK_CHARS = 12_000
const DEFAULT_OVERLAP_CHARS = 200

const PARAGRAPH_BREAK_RE = /\n\s*\n/
const SENTENCE_BREAK_RE = /(?<=[.!?;])\s+/

function computeContentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

/**
 * Split an over-budget piece into fixed-size slices with overlap.
 */
function hardSplit(text: string, maxChars: number, overlapChars: number): string[] {
  if (text.length <= maxChars) return [text]
  const overlap = Math.min(overlapChars, maxChars - 1)
  const pieces: string[] = []

  let offset = 0
  while (offset < text.length) {
    const end = Math.min(offset + maxChars, text.length)
    pieces.push(text.slice(offset, end))
    if (end === text.length) break
    offset = end - overlap
  }

  return pieces
}

/** Greedily join units with `separator` while the result stays within budget. */
function pack(units: string[], separator: string, maxChars: number): string[] {
  const packed: string[] = []
  let current = ''
  for (const unit of units) {
    if (current.length === 0) {
      current = unit
    } else if (current.length + separator.length + unit.length <= maxChars) {
      current += separator + unit
    } else {
      packed.push(current)
      current = unit
    }
  }
  if (current.length > 0) packed.push(current)
  return packed
}

function splitParagraph(paragraph: string, maxChars: number, overlapChars: number): string[] {
  if (paragraph.length <= maxChars) return [paragraph]
  const sentences = paragraph
    .split(SENTENCE_BREAK_RE)
    .flatMap((s) => hardSplit(s, maxChars, overlapChars))
  return pack(sentences, ' ', maxChars)
}

/**
 * Chunk document text for the extraction oracle. Empty or whitespace-only
 * text yields no chunks.
 */
export function chunkDocument(text: string, options?: ChunkerOptions): DocumentChunk[] {
  const maxChunkChars = Math.max(1, options?.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS)
  const overlapChars = Math.max(0, options?.overlapChars ?? DEFAULT_OVERLAP_CHARS)

  const normalized = text.replace(/\r\n?/g, '\n').trim()
  if (normalized.length === 0) return []

  const units = normalized
    .split(PARAGRAPH_BREAK_RE)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .flatMap((p) => splitParagraph(p, maxChunkChars, overlapChars))

  return pack(units, '\n\n', maxChunkChars).map((content, chunkIndex) => ({
    chunkIndex,
    content,
    contentHash: computeContentHash(content),
    charCount: content.length,
  }))
}
