export { FenestrationRegistry } from './FenestrationRegistry';
export { validateFenestration, findSpacingConflict } from './validation';
export type { SpacingConflict } from './validation';
export { clockAngleDeg } from './types';
export type { Fenestration, FenestrationRequest } from './types';
export { describeFenestration, fenestrationAnnotation, fenestrationLabel, formatMm } from './describe';
