/**
 * Calibration markers embedded in every rendered template.
 *
 * Everything here is a pure function of the graft and the layout config; the
 * fenestration layout plays no part. Positions are template millimetres (same
 * space as `unwrap`), x from the 12 o'clock seam and y from the proximal end.
 */

import { DEFAULT_TEMPLATE_CONFIG, type TemplateConfig } from '../config';
import { formatMm } from '../fenestration/describe';
import type { GraftSpecification } from '../graft';
import { clockToDegrees, unwrap, type ClockHour, type PlanarPoint } from '../unwrap';

export interface GridLine {
    y: number;
    label: string;
}

export interface AlignmentLine {
    y: number;
}

export interface ClockGuide {
    x: number;
    hour: ClockHour;
    label: string;
}

export interface ReferenceBar {
    orientation: 'horizontal' | 'vertical';
    from: PlanarPoint;
    to: PlanarPoint;
    label: string;
    labelPosition: PlanarPoint;
}

export interface EndLabel {
    y: number;
    text: string;
}

export interface CalibrationMarkerSet {
    gridLines: GridLine[];
    alignmentLines: AlignmentLine[];
    clockGuides: ClockGuide[];
    referenceBars: ReferenceBar[];
    proximal: EndLabel;
    distal: EndLabel;
}

type MarkerConfig = Pick<TemplateConfig, 'gridIntervalMm' | 'alignmentOffsetsMm' | 'referenceBarLengthMm'>;

/** Gap between the template's right edge and the reference bar column */
export const REFERENCE_BAR_GUTTER_MM = 22;

const GUIDE_HOURS: readonly ClockHour[] = [12, 3, 6, 9];

// Floating-point slack so a grid step landing exactly on the distal end is kept
const GRID_EPSILON = 1e-9;

export function createCalibrationMarkers(
    graft: GraftSpecification,
    config: MarkerConfig = DEFAULT_TEMPLATE_CONFIG,
): CalibrationMarkerSet {
    const circumference = graft.circumferenceMm;
    const length = graft.lengthMm;

    const gridLines: GridLine[] = [];
    for (let step = 0; step * config.gridIntervalMm <= length + GRID_EPSILON; step++) {
        const y = step * config.gridIntervalMm;
        gridLines.push({ y, label: `${formatMm(y)} mm` });
    }

    const alignmentLines = config.alignmentOffsetsMm
        .filter(offset => offset <= length)
        .map(offset => ({ y: offset }));

    const clockGuides: ClockGuide[] = GUIDE_HOURS.map(hour => ({
        x: unwrap(circumference, length, clockToDegrees(hour), 0).x,
        hour,
        label: String(hour),
    }));
    // The seam closes at the right edge as well
    clockGuides.push({ x: circumference, hour: 12, label: '12' });

    return {
        gridLines,
        alignmentLines,
        clockGuides,
        referenceBars: createReferenceBars(circumference, length, config.referenceBarLengthMm),
        proximal: { y: 0, text: 'PROXIMAL' },
        distal: { y: length, text: 'DISTAL' },
    };
}

/**
 * One horizontal and one vertical bar beside the template, so a rescale on
 * either print axis shows up.
 */
function createReferenceBars(circumference: number, length: number, barLength: number): ReferenceBar[] {
    const left = circumference + REFERENCE_BAR_GUTTER_MM;
    const top = length / 2 - barLength;
    const label = `${formatMm(barLength)} mm`;

    const horizontal: ReferenceBar = {
        orientation: 'horizontal',
        from: { x: left, y: top },
        to: { x: left + barLength, y: top },
        label,
        labelPosition: { x: left + barLength / 2, y: top - 2.5 },
    };

    const verticalX = left + barLength / 2;
    const verticalTop = top + 6;
    const vertical: ReferenceBar = {
        orientation: 'vertical',
        from: { x: verticalX, y: verticalTop },
        to: { x: verticalX, y: verticalTop + barLength },
        label,
        labelPosition: { x: verticalX + 2.5, y: verticalTop + barLength / 2 + 1 },
    };

    return [horizontal, vertical];
}
