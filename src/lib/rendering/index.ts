export { DocumentRenderer } from './DocumentRenderer';
export type { DocumentExporter, DocumentLayout, DocumentResult } from './DocumentRenderer';
export { PreviewRenderer } from './PreviewRenderer';
export type { PreviewResult } from './PreviewRenderer';
export { PlacedSurface } from './PlacedSurface';
export { RecordingSurface, replay } from './RecordingSurface';
export { RecordingExporter, RecordingPage } from './RecordingExporter';
export type { RecordedDocument } from './RecordingExporter';
export { composeTemplateScene, sceneExtents, SCENE_COLORS } from './scene';
export type { PlacedFenestration, TemplateScene } from './scene';
export { documentFileName, printInstructions, TEMPLATE_DISCLAIMER } from './instructions';
export type {
    DrawCommand,
    DrawLayer,
    DrawingSurface,
    Extents,
    PageSizeMm,
    Point,
    ShapeStyle,
    StrokeStyle,
    TextAnchor,
    TextStyle,
} from './types';
