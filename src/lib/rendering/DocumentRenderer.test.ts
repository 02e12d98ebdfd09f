import { describe, expect, it, vi } from 'vitest';
import { FenestrationRegistry, type Fenestration } from '../fenestration';
import { GraftSpecification, graftFromDevice } from '../graft';
import { DocumentRenderer, type DocumentExporter } from './DocumentRenderer';
import { RecordingExporter, type RecordingPage } from './RecordingExporter';
import { TEMPLATE_DISCLAIMER } from './instructions';

function graft(): GraftSpecification {
    const result = GraftSpecification.create(24, 145, 'TG-24-145');
    if (!result.ok) throw result.error;
    return result.value;
}

function registryOf(...fenestrations: Fenestration[]): FenestrationRegistry {
    let registry = FenestrationRegistry.empty();
    for (const fenestration of fenestrations) {
        const next = registry.add(fenestration);
        if (!next.ok) throw next.error;
        registry = next.value;
    }
    return registry;
}

const sma: Fenestration = { vessel: 'sma', distanceFromProximalMm: 50, clockHour: 12, diameterMm: 6 };
const renal: Fenestration = { vessel: 'rightRenal', distanceFromProximalMm: 54, clockHour: 3, diameterMm: 5 };

describe('DocumentRenderer', () => {
    const g = graft();
    const c = g.circumferenceMm;

    it('skips export for an empty layout', async () => {
        const exporter: DocumentExporter<RecordingPage, unknown> = {
            createDocument: vi.fn(),
            finalize: vi.fn(),
        };
        const result = await new DocumentRenderer().render(g, FenestrationRegistry.empty(), exporter);
        expect(result).toEqual({ status: 'empty' });
        expect(exporter.createDocument).not.toHaveBeenCalled();
    });

    it('lays the template out at scale 1 on an A4 page', () => {
        const layout = new DocumentRenderer().layout(g);
        expect(layout.page).toEqual({ widthMm: 210, heightMm: 297 });
        expect(layout.placement).toEqual({ scale: 1, offsetX: 26, offsetY: 35.25 });
        expect(layout.instructionsTop).toBe(194);
    });

    it('grows the page for a long graft instead of shrinking the template', () => {
        const long = graftFromDevice('tube-36x200');
        if (!long.ok) throw long.error;
        const layout = new DocumentRenderer().layout(long.value);
        expect(layout.page).toEqual({ widthMm: 210, heightMm: 306 });
        expect(layout.placement.scale).toBe(1);
    });

    it('renders the scene in page millimetres', async () => {
        const result = await new DocumentRenderer().render(g, registryOf(sma, renal), new RecordingExporter());
        if (result.status !== 'rendered') throw new Error('expected a rendered document');

        expect(result.fileName).toBe('graft_template_24mm_145mm.pdf');
        expect(result.fenestrationCount).toBe(2);
        expect(result.artifact.page).toEqual({ widthMm: 210, heightMm: 297 });

        const [title, subtitle, outline] = result.artifact.commands;
        expect(title).toMatchObject({
            kind: 'text',
            position: { x: 12, y: 16.5 },
            text: 'Fenestration template: TG-24-145 (24 × 145 mm)',
        });
        expect(subtitle).toMatchObject({
            kind: 'text',
            text: 'Circumference 75.4 mm. 12 o\'clock (anterior) is the seam at the left and right edges. 2 fenestrations.',
        });
        expect(outline.kind).toBe('rect');
        if (outline.kind !== 'rect') return;
        expect(outline.style.layer).toBe('outline');
        expect(outline.origin).toEqual({ x: 26, y: 35.25 });
        expect(outline.width).toBe(c);
        expect(outline.height).toBe(145);
    });

    it('draws fenestrations at true size', async () => {
        const result = await new DocumentRenderer().render(g, registryOf(sma, renal), new RecordingExporter());
        if (result.status !== 'rendered') throw new Error('expected a rendered document');

        const placed = result.artifact.commands.flatMap(command =>
            command.kind === 'circle' && command.style.layer === 'fenestration' ? [command] : []);
        expect(placed).toHaveLength(2);
        expect(placed[0].center).toEqual({ x: 26, y: 85.25 });
        expect(placed[0].radius).toBe(3);
        expect(placed[1].center.x).toBeCloseTo(26 + c / 4, 9);
        expect(placed[1].center.y).toBe(89.25);
        expect(placed[1].radius).toBe(2.5);
    });

    it('keeps both reference bars at 10 mm', async () => {
        const result = await new DocumentRenderer().render(g, registryOf(sma), new RecordingExporter());
        if (result.status !== 'rendered') throw new Error('expected a rendered document');

        const bars = result.artifact.commands.flatMap(command =>
            command.kind === 'line' && command.style.layer === 'calibration' ? [command] : []);
        expect(bars).toHaveLength(6);
        const [horizontal, , , vertical] = bars;
        expect(horizontal.from.y).toBe(97.75);
        expect(horizontal.to.x - horizontal.from.x).toBeCloseTo(10, 9);
        expect(vertical.to.y - vertical.from.y).toBeCloseTo(10, 9);
    });

    it('prints the instructions under the template', async () => {
        const result = await new DocumentRenderer().render(g, registryOf(sma), new RecordingExporter());
        if (result.status !== 'rendered') throw new Error('expected a rendered document');

        const lines = result.artifact.commands.flatMap(command =>
            command.kind === 'text' && command.style.layer === 'instructions' ? [command] : []);
        expect(lines).toHaveLength(8);
        expect(lines[0].text).toBe('Instructions');
        expect(lines[0].position).toEqual({ x: 12, y: 199 });
        expect(lines[3].text).toBe('3. Cut along the solid outline (75.4 × 145 mm).');
        expect(lines[7].text).toBe(TEMPLATE_DISCLAIMER);
        expect(lines[7].position.y).toBe(234);
    });

    it('moves the template with the page margin', () => {
        const layout = new DocumentRenderer({ pageMarginMm: 20 }).layout(g);
        expect(layout.placement.offsetX).toBe(34);
        expect(layout.placement.offsetY).toBe(43.25);
    });
});
