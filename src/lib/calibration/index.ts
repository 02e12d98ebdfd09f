export { createCalibrationMarkers, REFERENCE_BAR_GUTTER_MM } from './CalibrationMarkerSet';
export type {
    AlignmentLine,
    CalibrationMarkerSet,
    ClockGuide,
    EndLabel,
    GridLine,
    ReferenceBar,
} from './CalibrationMarkerSet';
