/**
 * Filter Engine
 *
 * Multi-criteria filtering, relaxation, suitability ranking and tag
 * synthesis over rental listings.
 */

export * from './config/engine-config.js';
export * from './criteria/criteria-model.js';
export * from './rules/index.js';
export * from './domains/index.js';
export * from './relaxation/relaxation-planner.js';
export * from './scoring/suitability-ranker.js';
export * from './tags/tag-synthesizer.js';
export * from './assembly/result-assembler.js';
export * from './search-engine.js';
