/**
 * Branch vessels a fenestration can serve.
 *
 * The set is closed: adding a vessel means extending `VesselId`, and the
 * `VESSELS` record then fails to compile until the new entry has a label and
 * a color.
 */

import { InvalidParameterError, fail, ok, type Result } from '../errors';

export type VesselId =
    | 'celiacTrunk'
    | 'sma'
    | 'rightRenal'
    | 'leftRenal'
    | 'accessoryRenal'
    | 'ima'
    | 'rightInternalIliac'
    | 'leftInternalIliac';

export interface VesselInfo {
    /** Anatomical name shown in lists */
    name: string;
    /** Label printed next to the fenestration */
    shortLabel: string;
    /** Fill color, #RRGGBB */
    color: string;
}

export const VESSELS: Record<VesselId, VesselInfo> = {
    celiacTrunk: { name: 'Celiac trunk', shortLabel: 'CT', color: '#8e44ad' },
    sma: { name: 'Superior mesenteric artery', shortLabel: 'SMA', color: '#d35400' },
    rightRenal: { name: 'Right renal artery', shortLabel: 'RRA', color: '#c0392b' },
    leftRenal: { name: 'Left renal artery', shortLabel: 'LRA', color: '#2980b9' },
    accessoryRenal: { name: 'Accessory renal artery', shortLabel: 'ARA', color: '#16a085' },
    ima: { name: 'Inferior mesenteric artery', shortLabel: 'IMA', color: '#7f8c8d' },
    rightInternalIliac: { name: 'Right internal iliac artery', shortLabel: 'RIIA', color: '#e67e22' },
    leftInternalIliac: { name: 'Left internal iliac artery', shortLabel: 'LIIA', color: '#27ae60' },
};

export const VESSEL_IDS = Object.keys(VESSELS).filter(isVesselId);

export function isVesselId(value: string): value is VesselId {
    return Object.prototype.hasOwnProperty.call(VESSELS, value);
}

export function getVessel(id: VesselId): VesselInfo {
    return VESSELS[id];
}

/**
 * Narrow a raw selection to a vessel id. Accepts the id itself, the short
 * label or the anatomical name, case-insensitively.
 */
export function parseVesselId(raw: string): Result<VesselId, InvalidParameterError> {
    const trimmed = raw.trim();
    if (isVesselId(trimmed)) return ok(trimmed);

    const needle = trimmed.toLowerCase();

    const match = VESSEL_IDS.find(id => {
        const info = VESSELS[id];
        return id.toLowerCase() === needle
            || info.shortLabel.toLowerCase() === needle
            || info.name.toLowerCase() === needle;
    });

    return match
        ? ok(match)
        : fail(new InvalidParameterError('vessel', `Unknown vessel "${raw}"`));
}
