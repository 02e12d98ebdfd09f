/**
 * Fixed-scale document renderer.
 *
 * Page coordinates are true millimetres: one document unit is one millimetre
 * on a page printed without scaling. The scene is only ever offset on the
 * page (placement scale 1); conversion to the backend's native unit happens
 * inside the export surface and nowhere else.
 */

import { resolveTemplateConfig, type TemplateConfig } from '../config';
import { formatMm, type FenestrationRegistry } from '../fenestration';
import type { GraftSpecification } from '../graft';
import { logger } from '../utils/Logger';
import type { PlacementTransform } from '../unwrap';
import { documentFileName, printInstructions, TEMPLATE_DISCLAIMER } from './instructions';
import { PlacedSurface } from './PlacedSurface';
import { replay } from './RecordingSurface';
import { composeTemplateScene, SCENE_COLORS, sceneExtents } from './scene';
import type { DrawingSurface, PageSizeMm } from './types';

/**
 * Export collaborator: opens a page of the given size and turns the finished
 * page into a downloadable artifact.
 */
export interface DocumentExporter<S extends DrawingSurface, A> {
    createDocument(page: PageSizeMm): Promise<S>;
    finalize(handle: S): Promise<A>;
}

export type DocumentResult<A> =
    | { status: 'empty' }
    | {
        status: 'rendered';
        artifact: A;
        fileName: string;
        page: PageSizeMm;
        placement: PlacementTransform;
        fenestrationCount: number;
    };

export interface DocumentLayout {
    page: PageSizeMm;
    placement: PlacementTransform;
    titleBaseline: number;
    subtitleBaseline: number;
    instructionsTop: number;
    lineHeight: number;
}

export class DocumentRenderer {
    private readonly config: TemplateConfig;

    constructor(config: Partial<TemplateConfig> = {}) {
        this.config = resolveTemplateConfig(config);
    }

    /**
     * Page geometry for a graft. The page never shrinks below the configured
     * size and grows when the template does not fit; the scale stays 1.
     */
    layout(graft: GraftSpecification): DocumentLayout {
        const { pageMarginMm: margin, fontSizeMm, page } = this.config;
        const extents = sceneExtents(graft, this.config);

        const titleBaseline = margin + fontSizeMm.title;
        const subtitleBaseline = titleBaseline + fontSizeMm.small * 2.5;
        const templateTop = subtitleBaseline + fontSizeMm.label * 1.5;

        const placement: PlacementTransform = {
            scale: 1,
            offsetX: margin - extents.minX,
            offsetY: templateTop - extents.minY,
        };

        const lineHeight = fontSizeMm.label * 2;
        const instructionsTop = placement.offsetY + extents.maxY + fontSizeMm.label * 1.5;
        // heading + steps + disclaimer
        const instructionLines = printInstructions(graft).length + 2;

        const neededWidth = placement.offsetX + extents.maxX + margin;
        const neededHeight = instructionsTop + (instructionLines + 1) * lineHeight + margin;

        return {
            page: {
                widthMm: Math.max(page.widthMm, neededWidth),
                heightMm: Math.max(page.heightMm, neededHeight),
            },
            placement,
            titleBaseline,
            subtitleBaseline,
            instructionsTop,
            lineHeight,
        };
    }

    async render<S extends DrawingSurface, A>(
        graft: GraftSpecification,
        registry: FenestrationRegistry,
        exporter: DocumentExporter<S, A>,
    ): Promise<DocumentResult<A>> {
        if (registry.isEmpty) {
            logger.info('document', 'Export skipped: no fenestrations planned');
            return { status: 'empty' };
        }

        const scene = composeTemplateScene(graft, registry, this.config);
        const layout = this.layout(graft);
        const margin = this.config.pageMarginMm;
        const { label, small, title } = this.config.fontSizeMm;

        const surface = await exporter.createDocument(layout.page);

        surface.drawText(
            { x: margin, y: layout.titleBaseline },
            `Fenestration template: ${graft.describe()}`,
            { layer: 'title', fontSize: title, color: SCENE_COLORS.ink, bold: true },
        );
        surface.drawText(
            { x: margin, y: layout.subtitleBaseline },
            `Circumference ${formatMm(graft.circumferenceMm)} mm. 12 o'clock (anterior) is the seam at the left and right edges. ` +
            `${registry.size} fenestration${registry.size === 1 ? '' : 's'}.`,
            { layer: 'title', fontSize: small, color: SCENE_COLORS.muted },
        );

        const placed = new PlacedSurface(surface, layout.placement);
        // Cut line: exactly circumference × length
        placed.drawRect({ x: 0, y: 0 }, graft.circumferenceMm, graft.lengthMm, {
            layer: 'outline',
            stroke: SCENE_COLORS.ink,
            lineWidth: 0.4,
        });
        replay(scene.commands, placed);

        let baseline = layout.instructionsTop + layout.lineHeight;
        surface.drawText({ x: margin, y: baseline }, 'Instructions', {
            layer: 'instructions', fontSize: label, color: SCENE_COLORS.ink, bold: true,
        });
        for (const line of printInstructions(graft, this.config.referenceBarLengthMm)) {
            baseline += layout.lineHeight;
            surface.drawText({ x: margin, y: baseline }, line, {
                layer: 'instructions', fontSize: small, color: SCENE_COLORS.ink,
            });
        }
        baseline += layout.lineHeight;
        surface.drawText({ x: margin, y: baseline }, TEMPLATE_DISCLAIMER, {
            layer: 'instructions', fontSize: small, color: SCENE_COLORS.muted,
        });

        const artifact = await exporter.finalize(surface);
        logger.info(
            'document',
            `Rendered ${graft.describe()} with ${registry.size} fenestration(s) on a ` +
            `${formatMm(layout.page.widthMm)} × ${formatMm(layout.page.heightMm)} mm page`,
        );

        return {
            status: 'rendered',
            artifact,
            fileName: documentFileName(graft),
            page: layout.page,
            placement: layout.placement,
            fenestrationCount: scene.fenestrations.length,
        };
    }
}
