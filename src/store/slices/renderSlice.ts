import { StateCreator } from 'zustand';
import { toast } from 'sonner';
import { DEFAULT_TEMPLATE_CONFIG } from '../../lib/config';
import { PdfExporter } from '../../lib/export';
import {
    DocumentRenderer,
    PreviewRenderer,
    RecordingSurface,
    type DocumentExporter,
    type DocumentResult,
    type DrawingSurface,
} from '../../lib/rendering';
import { logger } from '../../lib/utils/Logger';
import { PlannerState, RenderSlice } from '../types';

export const createRenderSlice: StateCreator<
    PlannerState,
    [],
    [],
    RenderSlice
> = (set, get) => {
    const exportWith = async <S extends DrawingSurface, A>(
        exporter: DocumentExporter<S, A>,
    ): Promise<DocumentResult<A>> => {
        const { graft, registry, config } = get();
        if (!graft || registry.isEmpty) {
            return { status: 'empty' };
        }

        set({ isExporting: true });
        toast.loading('Generating template...', { id: 'export' });
        try {
            const result = await new DocumentRenderer(config).render(graft, registry, exporter);
            toast.success('Template ready. Print at 100% scale.', { id: 'export' });
            return result;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('export', `Template export failed: ${message}`);
            toast.error(`Export failed: ${message}`, { id: 'export' });
            throw error;
        } finally {
            set({ isExporting: false });
        }
    };

    return {
        config: DEFAULT_TEMPLATE_CONFIG,
        isExporting: false,

        renderPreview: (pixelsPerMm) => {
            const { graft, registry, config } = get();
            if (!graft) return { status: 'empty' };

            const surface = new RecordingSurface();
            const result = new PreviewRenderer(config).render(graft, registry, surface, pixelsPerMm);
            if (result.status === 'empty') return result;
            return { ...result, commands: surface.getCommands() };
        },

        exportDocument: () => exportWith(new PdfExporter(get().graft?.describe())),

        exportWith,
    };
};
