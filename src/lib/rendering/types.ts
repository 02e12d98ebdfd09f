/**
 * Draw-primitive contract shared by every render target.
 *
 * Coordinates and lengths are in the surface's own units: millimetres for the
 * template scene and for document pages, pixels for the preview. Renderers
 * convert before calling a surface; surfaces never rescale on their own
 * except to reach their backend's native unit.
 */

import type { PlanarPoint } from '../unwrap';

export type Point = PlanarPoint;

/** Semantic grouping of primitives, used for styling and inspection */
export type DrawLayer =
    | 'background'
    | 'outline'
    | 'clock'
    | 'grid'
    | 'alignment'
    | 'calibration'
    | 'fenestration'
    | 'fenestrationWrap'
    | 'label'
    | 'title'
    | 'instructions';

export interface StrokeStyle {
    layer: DrawLayer;
    color: string;
    lineWidth: number;
    dash?: readonly number[];
    opacity?: number;
}

export interface ShapeStyle {
    layer: DrawLayer;
    fill?: string;
    stroke?: string;
    lineWidth?: number;
    dash?: readonly number[];
    opacity?: number;
}

export type TextAnchor = 'start' | 'middle' | 'end';

export interface TextStyle {
    layer: DrawLayer;
    /** Em size, surface units */
    fontSize: number;
    color: string;
    bold?: boolean;
    anchor?: TextAnchor;
}

export interface DrawingSurface {
    drawLine(from: Point, to: Point, style: StrokeStyle): void;
    drawCircle(center: Point, radius: number, style: ShapeStyle): void;
    /** `origin` is the top-left corner; y grows downward */
    drawRect(origin: Point, width: number, height: number, style: ShapeStyle): void;
    /** `position` is on the text baseline */
    drawText(position: Point, text: string, style: TextStyle): void;
}

export type DrawCommand =
    | { kind: 'line'; from: Point; to: Point; style: StrokeStyle }
    | { kind: 'circle'; center: Point; radius: number; style: ShapeStyle }
    | { kind: 'rect'; origin: Point; width: number; height: number; style: ShapeStyle }
    | { kind: 'text'; position: Point; text: string; style: TextStyle };

/** Axis-aligned box in template millimetres */
export interface Extents {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export interface PageSizeMm {
    widthMm: number;
    heightMm: number;
}
