import { applyPlacement, type PlacementTransform } from '../unwrap';
import type { DrawingSurface, Point, ShapeStyle, StrokeStyle, TextStyle } from './types';

/**
 * Decorator that places template-millimetre drawing onto a target surface.
 * Points go through the placement transform; lengths (radii, sizes, line
 * widths, dash patterns, font sizes) are multiplied by its scale.
 */
export class PlacedSurface implements DrawingSurface {
    constructor(
        private readonly target: DrawingSurface,
        readonly transform: PlacementTransform,
    ) {}

    private point(p: Point): Point {
        return applyPlacement(p, this.transform);
    }

    private length(value: number): number {
        return value * this.transform.scale;
    }

    private dash(dash: readonly number[] | undefined): readonly number[] | undefined {
        return dash?.map(segment => this.length(segment));
    }

    drawLine(from: Point, to: Point, style: StrokeStyle): void {
        this.target.drawLine(this.point(from), this.point(to), {
            ...style,
            lineWidth: this.length(style.lineWidth),
            dash: this.dash(style.dash),
        });
    }

    drawCircle(center: Point, radius: number, style: ShapeStyle): void {
        this.target.drawCircle(this.point(center), this.length(radius), this.scaleShape(style));
    }

    drawRect(origin: Point, width: number, height: number, style: ShapeStyle): void {
        this.target.drawRect(this.point(origin), this.length(width), this.length(height), this.scaleShape(style));
    }

    drawText(position: Point, text: string, style: TextStyle): void {
        this.target.drawText(this.point(position), text, {
            ...style,
            fontSize: this.length(style.fontSize),
        });
    }

    private scaleShape(style: ShapeStyle): ShapeStyle {
        return {
            ...style,
            lineWidth: style.lineWidth === undefined ? undefined : this.length(style.lineWidth),
            dash: this.dash(style.dash),
        };
    }
}
