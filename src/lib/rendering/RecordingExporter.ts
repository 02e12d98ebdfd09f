import type { DocumentExporter } from './DocumentRenderer';
import { RecordingSurface } from './RecordingSurface';
import type { DrawCommand, PageSizeMm } from './types';

export class RecordingPage extends RecordingSurface {
    constructor(readonly page: PageSizeMm) {
        super();
    }
}

export interface RecordedDocument {
    page: PageSizeMm;
    commands: readonly DrawCommand[];
}

/**
 * Export collaborator that keeps the page as draw commands instead of
 * encoding it. Used for inspection and dry runs.
 */
export class RecordingExporter implements DocumentExporter<RecordingPage, RecordedDocument> {
    async createDocument(page: PageSizeMm): Promise<RecordingPage> {
        return new RecordingPage(page);
    }

    async finalize(handle: RecordingPage): Promise<RecordedDocument> {
        return { page: handle.page, commands: handle.getCommands() };
    }
}
