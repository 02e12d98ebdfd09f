import type {
    DrawCommand,
    DrawLayer,
    DrawingSurface,
    Point,
    ShapeStyle,
    StrokeStyle,
    TextStyle,
} from './types';

/**
 * Surface that stores every call as a `DrawCommand`. Backs the SVG preview and
 * lets the geometry of any render be inspected without a drawing backend.
 */
export class RecordingSurface implements DrawingSurface {
    private readonly commands: DrawCommand[] = [];

    drawLine(from: Point, to: Point, style: StrokeStyle): void {
        this.commands.push({ kind: 'line', from, to, style });
    }

    drawCircle(center: Point, radius: number, style: ShapeStyle): void {
        this.commands.push({ kind: 'circle', center, radius, style });
    }

    drawRect(origin: Point, width: number, height: number, style: ShapeStyle): void {
        this.commands.push({ kind: 'rect', origin, width, height, style });
    }

    drawText(position: Point, text: string, style: TextStyle): void {
        this.commands.push({ kind: 'text', position, text, style });
    }

    getCommands(): readonly DrawCommand[] {
        return this.commands;
    }

    byLayer(layer: DrawLayer): DrawCommand[] {
        return this.commands.filter(command => command.style.layer === layer);
    }
}

/**
 * Replay recorded commands onto another surface.
 */
export function replay(commands: readonly DrawCommand[], surface: DrawingSurface): void {
    for (const command of commands) {
        switch (command.kind) {
            case 'line':
                surface.drawLine(command.from, command.to, command.style);
                break;
            case 'circle':
                surface.drawCircle(command.center, command.radius, command.style);
                break;
            case 'rect':
                surface.drawRect(command.origin, command.width, command.height, command.style);
                break;
            case 'text':
                surface.drawText(command.position, command.text, command.style);
                break;
        }
    }
}
