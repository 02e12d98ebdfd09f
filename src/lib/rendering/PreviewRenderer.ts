import { resolveTemplateConfig, type TemplateConfig } from '../config';
import type { FenestrationRegistry } from '../fenestration';
import type { GraftSpecification } from '../graft';
import type { PlacementTransform } from '../unwrap';
import { logger } from '../utils/Logger';
import { PlacedSurface } from './PlacedSurface';
import { replay } from './RecordingSurface';
import { composeTemplateScene, SCENE_COLORS } from './scene';
import type { DrawingSurface } from './types';

export type PreviewResult =
    | { status: 'empty' }
    | {
        status: 'rendered';
        widthPx: number;
        heightPx: number;
        placement: PlacementTransform;
        fenestrationCount: number;
    };

/**
 * Interactive preview: the template scene scaled to screen pixels, proximal
 * end at the top. An empty registry draws nothing and reports `empty` so the
 * UI can show its placeholder.
 */
export class PreviewRenderer {
    private readonly config: TemplateConfig;

    constructor(config: Partial<TemplateConfig> = {}) {
        this.config = resolveTemplateConfig(config);
    }

    render(
        graft: GraftSpecification,
        registry: FenestrationRegistry,
        surface: DrawingSurface,
        pixelsPerMm: number = this.config.previewPixelsPerMm,
    ): PreviewResult {
        if (registry.isEmpty) {
            return { status: 'empty' };
        }

        if (!(Number.isFinite(pixelsPerMm) && pixelsPerMm > 0)) {
            logger.warn('preview', `Ignoring preview scale ${pixelsPerMm}; using ${this.config.previewPixelsPerMm} px/mm`);
            pixelsPerMm = this.config.previewPixelsPerMm;
        }

        const scene = composeTemplateScene(graft, registry, this.config);
        const { extents } = scene;
        const placement: PlacementTransform = {
            scale: pixelsPerMm,
            offsetX: -extents.minX * pixelsPerMm,
            offsetY: -extents.minY * pixelsPerMm,
        };
        const placed = new PlacedSurface(surface, placement);

        placed.drawRect({ x: 0, y: 0 }, graft.circumferenceMm, graft.lengthMm, {
            layer: 'background',
            fill: '#f4f6f8',
            stroke: SCENE_COLORS.ink,
            lineWidth: 0.3,
        });
        replay(scene.commands, placed);

        return {
            status: 'rendered',
            widthPx: (extents.maxX - extents.minX) * pixelsPerMm,
            heightPx: (extents.maxY - extents.minY) * pixelsPerMm,
            placement,
            fenestrationCount: scene.fenestrations.length,
        };
    }
}
