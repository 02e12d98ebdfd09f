import React, { useMemo } from 'react';
import type { DrawCommand } from '@/lib/rendering';
import type { PreviewSnapshot } from '@/store/types';
import { usePlannerStore } from '@/store/PlannerStoreContext';

const FONT_FAMILY = 'Helvetica, Arial, sans-serif';

function dashAttr(dash: readonly number[] | undefined): string | undefined {
    return dash && dash.length > 0 ? dash.join(' ') : undefined;
}

function renderCommand(command: DrawCommand, key: number) {
    switch (command.kind) {
        case 'line':
            return (
                <line
                    key={key}
                    data-layer={command.style.layer}
                    x1={command.from.x}
                    y1={command.from.y}
                    x2={command.to.x}
                    y2={command.to.y}
                    stroke={command.style.color}
                    strokeWidth={command.style.lineWidth}
                    strokeDasharray={dashAttr(command.style.dash)}
                    strokeOpacity={command.style.opacity}
                />
            );
        case 'circle':
            return (
                <circle
                    key={key}
                    data-layer={command.style.layer}
                    cx={command.center.x}
                    cy={command.center.y}
                    r={command.radius}
                    fill={command.style.fill ?? 'none'}
                    fillOpacity={command.style.opacity}
                    stroke={command.style.stroke}
                    strokeWidth={command.style.lineWidth}
                    strokeDasharray={dashAttr(command.style.dash)}
                />
            );
        case 'rect':
            return (
                <rect
                    key={key}
                    data-layer={command.style.layer}
                    x={command.origin.x}
                    y={command.origin.y}
                    width={command.width}
                    height={command.height}
                    fill={command.style.fill ?? 'none'}
                    fillOpacity={command.style.opacity}
                    stroke={command.style.stroke}
                    strokeWidth={command.style.lineWidth}
                    strokeDasharray={dashAttr(command.style.dash)}
                />
            );
        case 'text':
            return (
                <text
                    key={key}
                    data-layer={command.style.layer}
                    x={command.position.x}
                    y={command.position.y}
                    fontSize={command.style.fontSize}
                    fontFamily={FONT_FAMILY}
                    fontWeight={command.style.bold ? 'bold' : undefined}
                    fill={command.style.color}
                    textAnchor={command.style.anchor ?? 'start'}
                >
                    {command.text}
                </text>
            );
    }
}

interface TemplatePreviewProps {
    preview: PreviewSnapshot;
    placeholder?: React.ReactNode;
}

/**
 * SVG rendering of a recorded preview. Coordinates arrive in pixels already;
 * the component draws them one-to-one.
 */
export const TemplatePreview = ({ preview, placeholder }: TemplatePreviewProps) => {
    if (preview.status === 'empty') {
        return (
            <div className="template-preview-empty">
                {placeholder ?? 'No fenestrations planned yet'}
            </div>
        );
    }

    return (
        <svg
            className="template-preview"
            xmlns="http://www.w3.org/2000/svg"
            width={preview.widthPx}
            height={preview.heightPx}
            viewBox={`0 0 ${preview.widthPx} ${preview.heightPx}`}
        >
            {preview.commands.map(renderCommand)}
        </svg>
    );
};

interface PlannerPreviewProps {
    pixelsPerMm?: number;
    placeholder?: React.ReactNode;
}

/**
 * Preview bound to the session store; redraws when the graft or the layout
 * changes.
 */
export const PlannerPreview = ({ pixelsPerMm, placeholder }: PlannerPreviewProps) => {
    const graft = usePlannerStore(state => state.graft);
    const registry = usePlannerStore(state => state.registry);
    const renderPreview = usePlannerStore(state => state.renderPreview);

    const preview = useMemo(
        () => renderPreview(pixelsPerMm),
        // graft and registry are immutable values; a new one means a new layout
        [renderPreview, graft, registry, pixelsPerMm],
    );

    return <TemplatePreview preview={preview} placeholder={placeholder} />;
};
