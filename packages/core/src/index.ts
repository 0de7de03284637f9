/**
 * @loan-obligations/core
 *
 * Turns loan document text into structured obligations and answers
 * filtered, deadline and natural-language queries over them.
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './requirements/index.js'
export * from './normalizer/index.js'
export * from './deadlines/index.js'
export * from './agents/index.js'
export * from './extraction/index.js'
export * from './query/index.js'
export * from './storage/index.js'
export * from './profiles/index.js'
