import { ConfigurationError } from './errors';

/**
 * Template layout and validation settings. All lengths are millimetres.
 */
export interface TemplateConfig {
    /** Minimum longitudinal gap between any two fenestrations */
    minSpacingMm: number;
    /** Smallest fenestration diameter accepted */
    minFenestrationDiameterMm: number;
    /** Largest fenestration diameter accepted */
    maxFenestrationDiameterMm: number;
    /** Spacing of the labelled longitudinal grid */
    gridIntervalMm: number;
    /** Structural landmark offsets from the proximal end */
    alignmentOffsetsMm: readonly number[];
    /** Length of each printed reference bar */
    referenceBarLengthMm: number;
    /** Screen scale of the interactive preview */
    previewPixelsPerMm: number;
    /** Minimum printed page size; grows when the template does not fit */
    page: { widthMm: number; heightMm: number };
    /** Blank border kept on every page edge */
    pageMarginMm: number;
    /** Text heights */
    fontSizeMm: { label: number; small: number; title: number };
}

export const DEFAULT_TEMPLATE_CONFIG: TemplateConfig = {
    minSpacingMm: 4.0,
    minFenestrationDiameterMm: 4.0,
    maxFenestrationDiameterMm: 12.0,
    gridIntervalMm: 15,
    alignmentOffsetsMm: [30, 60, 90, 120],
    referenceBarLengthMm: 10,
    previewPixelsPerMm: 4,
    page: { widthMm: 210, heightMm: 297 }, // A4 portrait
    pageMarginMm: 12,
    fontSizeMm: { label: 2.5, small: 2, title: 4.5 },
};

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveTemplateConfig(overrides: Partial<TemplateConfig> = {}): TemplateConfig {
    const config: TemplateConfig = { ...DEFAULT_TEMPLATE_CONFIG, ...overrides };

    const positive: Array<[string, number]> = [
        ['minSpacingMm', config.minSpacingMm],
        ['minFenestrationDiameterMm', config.minFenestrationDiameterMm],
        ['maxFenestrationDiameterMm', config.maxFenestrationDiameterMm],
        ['gridIntervalMm', config.gridIntervalMm],
        ['referenceBarLengthMm', config.referenceBarLengthMm],
        ['previewPixelsPerMm', config.previewPixelsPerMm],
        ['page.widthMm', config.page.widthMm],
        ['page.heightMm', config.page.heightMm],
        ['fontSizeMm.label', config.fontSizeMm.label],
        ['fontSizeMm.small', config.fontSizeMm.small],
        ['fontSizeMm.title', config.fontSizeMm.title],
    ];
    for (const [key, value] of positive) {
        if (!Number.isFinite(value) || value <= 0) {
            throw new ConfigurationError(`Template config "${key}" must be a positive number, got ${value}`);
        }
    }

    if (config.minFenestrationDiameterMm > config.maxFenestrationDiameterMm) {
        throw new ConfigurationError('Template config fenestration diameter bounds are inverted');
    }
    if (!Number.isFinite(config.pageMarginMm) || config.pageMarginMm < 0) {
        throw new ConfigurationError(`Template config "pageMarginMm" must be >= 0, got ${config.pageMarginMm}`);
    }
    if (config.alignmentOffsetsMm.some(offset => !Number.isFinite(offset) || offset < 0)) {
        throw new ConfigurationError('Template config "alignmentOffsetsMm" must hold non-negative numbers');
    }

    return config;
}
