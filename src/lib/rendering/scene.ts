/**
 * Template scene composition.
 *
 * Both renderers draw the same scene: the preview scales it to pixels, the
 * document offsets it on a millimetre page. Everything here is template
 * millimetres, straight out of `unwrap` and the calibration marker set.
 */

import { createCalibrationMarkers, REFERENCE_BAR_GUTTER_MM, type CalibrationMarkerSet } from '../calibration';
import { DEFAULT_TEMPLATE_CONFIG, type TemplateConfig } from '../config';
import {
    fenestrationAnnotation,
    fenestrationLabel,
    type Fenestration,
    type FenestrationRegistry,
} from '../fenestration';
import type { GraftSpecification } from '../graft';
import { mapFenestration, type PlanarPoint } from '../unwrap';
import { getVessel } from '../vessels';
import type { DrawCommand, Extents } from './types';

export const SCENE_COLORS = {
    ink: '#1a202c',
    muted: '#4a5568',
    grid: '#9aa5b1',
    clock: '#2b6cb0',
    alignment: '#d4a017',
    calibration: '#000000',
} as const;

// Room left of x = 0 for the grid labels
const LEFT_GUTTER_MM = 14;
const TICK_HALF_MM = 1.5;
const CROSSHAIR_HALF_MM = 1;
const LABEL_GAP_MM = 1.2;
// Past this share of the circumference, labels go left of the circle
const LABEL_FLIP_RATIO = 0.8;

export interface PlacedFenestration {
    index: number;
    fenestration: Fenestration;
    center: PlanarPoint;
    radius: number;
}

export interface TemplateScene {
    graft: GraftSpecification;
    markers: CalibrationMarkerSet;
    fenestrations: PlacedFenestration[];
    commands: DrawCommand[];
    extents: Extents;
}

export function sceneExtents(graft: GraftSpecification, config: TemplateConfig): Extents {
    const overhang = config.maxFenestrationDiameterMm / 2 + 4;
    return {
        minX: -LEFT_GUTTER_MM,
        minY: -overhang,
        maxX: graft.circumferenceMm + REFERENCE_BAR_GUTTER_MM + config.referenceBarLengthMm + 12,
        maxY: graft.lengthMm + overhang,
    };
}

export function composeTemplateScene(
    graft: GraftSpecification,
    registry: FenestrationRegistry,
    config: TemplateConfig = DEFAULT_TEMPLATE_CONFIG,
): TemplateScene {
    const markers = createCalibrationMarkers(graft, config);
    const fenestrations = registry.toArray().map((fenestration, index) => ({
        index,
        fenestration,
        center: mapFenestration(graft, fenestration),
        radius: fenestration.diameterMm / 2,
    }));

    const commands: DrawCommand[] = [
        ...markerCommands(graft, markers, config),
        ...fenestrations.flatMap(placed => fenestrationCommands(graft, placed, config)),
    ];

    return {
        graft,
        markers,
        fenestrations,
        commands,
        extents: sceneExtents(graft, config),
    };
}

function markerCommands(
    graft: GraftSpecification,
    markers: CalibrationMarkerSet,
    config: TemplateConfig,
): DrawCommand[] {
    const c = graft.circumferenceMm;
    const length = graft.lengthMm;
    const { label: labelSize, small } = config.fontSizeMm;
    const commands: DrawCommand[] = [];

    for (const guide of markers.clockGuides) {
        commands.push({
            kind: 'line',
            from: { x: guide.x, y: 0 },
            to: { x: guide.x, y: length },
            style: { layer: 'clock', color: SCENE_COLORS.clock, lineWidth: 0.2, dash: [1.5, 1] },
        });
        commands.push({
            kind: 'text',
            position: { x: guide.x, y: -2 },
            text: guide.label,
            style: { layer: 'clock', fontSize: labelSize, color: SCENE_COLORS.clock, anchor: 'middle' },
        });
    }

    for (const grid of markers.gridLines) {
        commands.push({
            kind: 'line',
            from: { x: 0, y: grid.y },
            to: { x: c, y: grid.y },
            style: { layer: 'grid', color: SCENE_COLORS.grid, lineWidth: 0.15 },
        });
        commands.push({
            kind: 'text',
            position: { x: -1.5, y: grid.y + small * 0.4 },
            text: grid.label,
            style: { layer: 'grid', fontSize: small, color: SCENE_COLORS.muted, anchor: 'end' },
        });
    }

    for (const alignment of markers.alignmentLines) {
        commands.push({
            kind: 'line',
            from: { x: 0, y: alignment.y },
            to: { x: c, y: alignment.y },
            style: { layer: 'alignment', color: SCENE_COLORS.alignment, lineWidth: 0.6 },
        });
    }

    for (const end of [markers.proximal, markers.distal]) {
        commands.push({
            kind: 'text',
            position: { x: c + 2, y: end.y + labelSize * 0.4 },
            text: end.text,
            style: { layer: 'label', fontSize: labelSize, color: SCENE_COLORS.ink, bold: true, anchor: 'start' },
        });
    }

    for (const bar of markers.referenceBars) {
        const barStyle = { layer: 'calibration', color: SCENE_COLORS.calibration, lineWidth: 0.3 } as const;
        commands.push({ kind: 'line', from: bar.from, to: bar.to, style: barStyle });

        for (const end of [bar.from, bar.to]) {
            const tick = bar.orientation === 'horizontal'
                ? { from: { x: end.x, y: end.y - TICK_HALF_MM }, to: { x: end.x, y: end.y + TICK_HALF_MM } }
                : { from: { x: end.x - TICK_HALF_MM, y: end.y }, to: { x: end.x + TICK_HALF_MM, y: end.y } };
            commands.push({ kind: 'line', ...tick, style: barStyle });
        }

        commands.push({
            kind: 'text',
            position: bar.labelPosition,
            text: bar.label,
            style: {
                layer: 'calibration',
                fontSize: small,
                color: SCENE_COLORS.calibration,
                anchor: bar.orientation === 'horizontal' ? 'middle' : 'start',
            },
        });
    }

    return commands;
}

/**
 * Circle, crosshair and labels for one fenestration. A circle that crosses
 * the 12 o'clock seam also gets a copy on the far side of the seam, since
 * that part of the hole lands on the opposite paper edge once wrapped.
 */
function fenestrationCommands(
    graft: GraftSpecification,
    placed: PlacedFenestration,
    config: TemplateConfig,
): DrawCommand[] {
    const { center, radius, fenestration } = placed;
    const c = graft.circumferenceMm;
    const vessel = getVessel(fenestration.vessel);
    const { label: labelSize, small } = config.fontSizeMm;
    const commands: DrawCommand[] = [];

    const wrapOffsets: number[] = [];
    if (center.x - radius < 0) wrapOffsets.push(c);
    if (center.x + radius > c) wrapOffsets.push(-c);
    for (const offset of wrapOffsets) {
        commands.push({
            kind: 'circle',
            center: { x: center.x + offset, y: center.y },
            radius,
            style: {
                layer: 'fenestrationWrap',
                fill: vessel.color,
                opacity: 0.35,
                stroke: SCENE_COLORS.ink,
                lineWidth: 0.2,
                dash: [1, 0.8],
            },
        });
    }

    commands.push({
        kind: 'circle',
        center,
        radius,
        style: { layer: 'fenestration', fill: vessel.color, opacity: 0.75, stroke: SCENE_COLORS.ink, lineWidth: 0.2 },
    });

    const crosshair = { layer: 'fenestration', color: SCENE_COLORS.ink, lineWidth: 0.15 } as const;
    commands.push({
        kind: 'line',
        from: { x: center.x - CROSSHAIR_HALF_MM, y: center.y },
        to: { x: center.x + CROSSHAIR_HALF_MM, y: center.y },
        style: crosshair,
    });
    commands.push({
        kind: 'line',
        from: { x: center.x, y: center.y - CROSSHAIR_HALF_MM },
        to: { x: center.x, y: center.y + CROSSHAIR_HALF_MM },
        style: crosshair,
    });

    const flip = center.x > c * LABEL_FLIP_RATIO;
    const textX = flip ? center.x - radius - LABEL_GAP_MM : center.x + radius + LABEL_GAP_MM;
    const anchor = flip ? 'end' : 'start';
    commands.push({
        kind: 'text',
        position: { x: textX, y: center.y - 0.3 },
        text: `${fenestrationLabel(placed.index)} ${vessel.shortLabel}`,
        style: { layer: 'label', fontSize: labelSize, color: SCENE_COLORS.ink, bold: true, anchor },
    });
    commands.push({
        kind: 'text',
        position: { x: textX, y: center.y + small + 0.5 },
        text: fenestrationAnnotation(fenestration),
        style: { layer: 'label', fontSize: small, color: SCENE_COLORS.muted, anchor },
    });

    return commands;
}
