/**
 * Lift plan engine: expand a sectioned treadling, derive the shafts raised on
 * every pick, and lay the result out for export.
 */

export * from './treadling/model.js';
export { createTieUp, shaftsForTreadle } from './treadling/tieup.js';
export * from './plan/planModel.js';
export { expandSequence, expandFlatTreadling, getSection, formatBeginLabel, formatEndLabel } from './sequences/expand.js';
export { deriveLiftPlan, findUnknownTreadles, expandTreadling, buildLiftPlan } from './plan/derive.js';
export * from './errors.js';
export * from './config.js';
export { layoutLiftPlan, type GridLayout, type GridRow, type PickRow, type DividerRow, type LayoutOptions, type OutOfRangeShaft } from './render/layout.js';
export { renderText, RAISED, LOWERED } from './render/text.js';
export * from './import/index.js';
export * from './export/index.js';
export * from './util/index.js';
