import type { TemplateConfig } from '../lib/config';
import type { InvalidParameterError, PlannerError, Result } from '../lib/errors';
import type { Fenestration, FenestrationRegistry, FenestrationRequest } from '../lib/fenestration';
import type { DeviceEntry, GraftSpecification } from '../lib/graft';
import type {
    DocumentExporter,
    DocumentResult,
    DrawCommand,
    DrawingSurface,
    PreviewResult,
} from '../lib/rendering';

export interface GraftSlice {
    /** Device catalog the session selects from */
    catalog: readonly DeviceEntry[];
    graft: GraftSpecification | null;
    /** Catalog key of the selected device, null for a custom graft */
    deviceKey: string | null;

    /** Choose a catalog device. Clears the planned fenestrations. */
    selectDevice: (key: string) => Result<GraftSpecification, InvalidParameterError>;
    /** Choose explicit dimensions. Clears the planned fenestrations. */
    selectCustomGraft: (diameterMm: number, lengthMm: number, name?: string) => Result<GraftSpecification, InvalidParameterError>;
}

export interface FenestrationSlice {
    registry: FenestrationRegistry;
    /** Most recent rejected command, for the form to explain */
    lastRejection: PlannerError | null;

    addFenestration: (request: FenestrationRequest) => Result<Fenestration>;
    removeFenestration: (index: number) => Result<Fenestration, InvalidParameterError>;
    clearFenestrations: () => void;
    /** One line per fenestration, in insertion order */
    describeLayout: () => string[];
}

export type PreviewSnapshot =
    | { status: 'empty' }
    | (Extract<PreviewResult, { status: 'rendered' }> & { commands: readonly DrawCommand[] });

export interface RenderSlice {
    config: TemplateConfig;
    isExporting: boolean;

    /** Draw the current layout for the on-screen preview */
    renderPreview: (pixelsPerMm?: number) => PreviewSnapshot;
    /** True-scale PDF of the current layout */
    exportDocument: () => Promise<DocumentResult<Uint8Array>>;
    /** Same document through another export collaborator */
    exportWith: <S extends DrawingSurface, A>(exporter: DocumentExporter<S, A>) => Promise<DocumentResult<A>>;
}

export type PlannerState = GraftSlice & FenestrationSlice & RenderSlice;
