/**
 * pdf-lib export surface.
 *
 * Callers draw in page millimetres with the origin at the top-left corner and
 * y growing downward. This is the only place that converts to PDF points
 * (1 pt = 1/72 in, so 1 mm = 72 / 25.4 pt) and flips y to PDF's bottom-left
 * origin. A template printed at 100% from this file has its 10 mm bars
 * measuring 10 mm.
 */

import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage, type RGB } from 'pdf-lib';
import type { DocumentExporter } from '../rendering/DocumentRenderer';
import type {
    DrawingSurface,
    PageSizeMm,
    Point,
    ShapeStyle,
    StrokeStyle,
    TextStyle,
} from '../rendering/types';

export const MM_PER_INCH = 25.4;
export const PT_PER_INCH = 72;
export const MM_TO_PT = PT_PER_INCH / MM_PER_INCH;

export function mmToPt(mm: number): number {
    return mm * MM_TO_PT;
}

/**
 * Converts a hex color (#RRGGBB) to pdf-lib RGB values.
 */
export function hexToRgbColor(hex: string): RGB {
    const h = hex.replace('#', '');
    if (!/^[0-9a-fA-F]{6}$/.test(h)) {
        throw new RangeError(`Expected a #RRGGBB color, got "${hex}"`);
    }
    const r = parseInt(h.substring(0, 2), 16) / 255;
    const g = parseInt(h.substring(2, 4), 16) / 255;
    const b = parseInt(h.substring(4, 6), 16) / 255;
    return rgb(r, g, b);
}

/**
 * Replace what the standard fonts cannot encode (WinAnsi): line breaks and
 * other whitespace become spaces, anything else becomes "?".
 */
export function encodableText(text: string, supported: ReadonlySet<number>): string {
    let out = '';
    for (const char of text) {
        const code = char.codePointAt(0) ?? 0;
        if (supported.has(code)) out += char;
        else out += /\s/.test(char) ? ' ' : '?';
    }
    return out;
}

interface Fonts {
    regular: PDFFont;
    bold: PDFFont;
}

export class PdfSurface implements DrawingSurface {
    private constructor(
        readonly document: PDFDocument,
        private readonly page: PDFPage,
        private readonly fonts: Fonts,
        readonly pageSize: PageSizeMm,
        private readonly charset: ReadonlySet<number>,
    ) {}

    static async create(pageSize: PageSizeMm, title = 'Fenestration template'): Promise<PdfSurface> {
        const document = await PDFDocument.create();
        document.setTitle(title);
        document.setCreator('fenestration-template-planner');

        const page = document.addPage([mmToPt(pageSize.widthMm), mmToPt(pageSize.heightMm)]);
        const fonts: Fonts = {
            regular: await document.embedFont(StandardFonts.Helvetica),
            bold: await document.embedFont(StandardFonts.HelveticaBold),
        };
        // Helvetica and Helvetica-Bold share the WinAnsi character set
        return new PdfSurface(document, page, fonts, pageSize, new Set(fonts.regular.getCharacterSet()));
    }

    /** Page millimetres (top-left origin) → PDF points (bottom-left origin) */
    toPdfPoint(p: Point): { x: number; y: number } {
        return { x: mmToPt(p.x), y: mmToPt(this.pageSize.heightMm - p.y) };
    }

    drawLine(from: Point, to: Point, style: StrokeStyle): void {
        this.page.drawLine({
            start: this.toPdfPoint(from),
            end: this.toPdfPoint(to),
            thickness: mmToPt(style.lineWidth),
            color: hexToRgbColor(style.color),
            opacity: style.opacity,
            dashArray: style.dash?.map(mmToPt),
        });
    }

    drawCircle(center: Point, radius: number, style: ShapeStyle): void {
        const { x, y } = this.toPdfPoint(center);
        this.page.drawCircle({
            x,
            y,
            size: mmToPt(radius),
            color: style.fill ? hexToRgbColor(style.fill) : undefined,
            opacity: style.opacity,
            borderColor: style.stroke ? hexToRgbColor(style.stroke) : undefined,
            borderWidth: style.stroke ? mmToPt(style.lineWidth ?? 0.2) : undefined,
            borderOpacity: style.stroke ? 1 : undefined,
            borderDashArray: style.dash?.map(mmToPt),
        });
    }

    drawRect(origin: Point, width: number, height: number, style: ShapeStyle): void {
        // pdf-lib anchors rectangles at their bottom-left corner
        const { x, y } = this.toPdfPoint({ x: origin.x, y: origin.y + height });
        this.page.drawRectangle({
            x,
            y,
            width: mmToPt(width),
            height: mmToPt(height),
            color: style.fill ? hexToRgbColor(style.fill) : undefined,
            opacity: style.opacity,
            borderColor: style.stroke ? hexToRgbColor(style.stroke) : undefined,
            borderWidth: style.stroke ? mmToPt(style.lineWidth ?? 0.2) : undefined,
            borderDashArray: style.dash?.map(mmToPt),
        });
    }

    drawText(position: Point, raw: string, style: TextStyle): void {
        const font = style.bold ? this.fonts.bold : this.fonts.regular;
        const text = encodableText(raw, this.charset);
        const size = mmToPt(style.fontSize);
        const width = font.widthOfTextAtSize(text, size);
        const { x, y } = this.toPdfPoint(position);

        let shift = 0;
        if (style.anchor === 'middle') shift = width / 2;
        else if (style.anchor === 'end') shift = width;

        this.page.drawText(text, {
            x: x - shift,
            y,
            size,
            font,
            color: hexToRgbColor(style.color),
        });
    }
}

/**
 * Export collaborator producing PDF bytes.
 */
export class PdfExporter implements DocumentExporter<PdfSurface, Uint8Array> {
    constructor(private readonly title?: string) {}

    createDocument(page: PageSizeMm): Promise<PdfSurface> {
        return PdfSurface.create(page, this.title);
    }

    finalize(handle: PdfSurface): Promise<Uint8Array> {
        return handle.document.save();
    }
}
