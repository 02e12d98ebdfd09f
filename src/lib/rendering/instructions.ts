import { formatMm } from '../fenestration';
import type { GraftSpecification } from '../graft';

/**
 * Printed usage steps. Kept to characters the standard PDF fonts can encode.
 */
export function printInstructions(graft: GraftSpecification, referenceBarLengthMm = 10): string[] {
    const bar = formatMm(referenceBarLengthMm);
    return [
        '1. Print at 100% scale ("Actual size"). Turn off "Fit to page" and any scaling.',
        `2. Measure both ${bar} mm reference bars. If either is not exactly ${bar} mm, discard this print.`,
        `3. Cut along the solid outline (${formatMm(graft.circumferenceMm)} × ${formatMm(graft.lengthMm)} mm).`,
        '4. Cut out every fenestration circle, including dashed copies at the edges.',
        '5. Wrap into a cylinder, joining the left and right edges at 12 o\'clock (anterior).',
        `6. The wrapped template must measure ${formatMm(graft.diameterMm)} mm in diameter. Align PROXIMAL with the proximal end.`,
    ];
}

export const TEMPLATE_DISCLAIMER =
    'Planning aid only. Verify every dimension against the device before clinical use.';

export function documentFileName(graft: GraftSpecification): string {
    return `graft_template_${formatMm(graft.diameterMm)}mm_${formatMm(graft.lengthMm)}mm.pdf`;
}
