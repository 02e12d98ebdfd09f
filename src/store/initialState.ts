import { resolveTemplateConfig, type TemplateConfig } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { FenestrationRegistry } from '../lib/fenestration';
import { DEVICE_CATALOG, graftFromDevice, type DeviceEntry, type GraftSpecification } from '../lib/graft';

export interface PlannerStoreOptions {
    /** Overrides merged onto the default template config */
    config?: Partial<TemplateConfig>;
    /** Replaces the bundled device catalog */
    catalog?: readonly DeviceEntry[];
    /** Device selected when the session opens */
    deviceKey?: string;
}

export interface InitialPatch {
    config: TemplateConfig;
    catalog: readonly DeviceEntry[];
    registry: FenestrationRegistry;
    graft?: GraftSpecification;
    deviceKey?: string;
}

export function buildInitialPatch(options: PlannerStoreOptions): InitialPatch {
    const config = resolveTemplateConfig(options.config);
    const catalog = options.catalog ?? DEVICE_CATALOG;
    const patch: InitialPatch = {
        config,
        catalog,
        registry: FenestrationRegistry.empty(config.minSpacingMm),
    };

    if (options.deviceKey !== undefined) {
        const graft = graftFromDevice(options.deviceKey, catalog);
        if (!graft.ok) {
            throw new ConfigurationError(graft.error.message);
        }
        patch.graft = graft.value;
        patch.deviceKey = options.deviceKey;
    }

    return patch;
}
