/**
 * Canvas 2D floor plan renderer.
 *
 * Pure function that draws projected drawables to a canvas context, in list order.
 */
import type { CanvasPoint } from '@/types';

import type {
    CircleDrawable,
    CompassDrawable,
    Drawable,
    GridDrawable,
    PolygonDrawable,
    PolylineDrawable,
    RectDrawable,
    SegmentDrawable,
    ShapeStyle,
    StrokeStyle,
} from './types';

// =============================================================================
// STYLE HELPERS
// =============================================================================

const applyStroke = (ctx: CanvasRenderingContext2D, style: StrokeStyle): void => {
    ctx.strokeStyle = style.strokeColor;
    ctx.lineWidth = style.lineWidth;
    ctx.lineCap = style.lineCap ?? 'butt';
    ctx.setLineDash(style.dash ? [...style.dash] : []);
};

const fillAndStroke = (ctx: CanvasRenderingContext2D, style: ShapeStyle): void => {
    if (style.fillColor) {
        ctx.fillStyle = style.fillColor;
        ctx.fill();
    }
    if (style.strokeColor) {
        ctx.strokeStyle = style.strokeColor;
        ctx.lineWidth = style.lineWidth ?? 1;
        ctx.stroke();
    }
};

const tracePath = (ctx: CanvasRenderingContext2D, points: readonly CanvasPoint[]): void => {
    const [first, ...rest] = points;
    if (!first) {
        return;
    }
    ctx.moveTo(first.x, first.y);
    for (const point of rest) {
        ctx.lineTo(point.x, point.y);
    }
};

// =============================================================================
// DRAWABLE RENDERERS
// =============================================================================

const renderGrid = (ctx: CanvasRenderingContext2D, drawable: GridDrawable): void => {
    const { size, origin, spacing, style } = drawable;
    if (!Number.isFinite(spacing) || spacing <= 0) {
        return;
    }

    ctx.save();
    applyStroke(ctx, style);
    ctx.beginPath();

    const startX = ((origin.x % spacing) + spacing) % spacing;
    for (let x = startX; x < size.width; x += spacing) {
        ctx.moveTo(x, 0);
        ctx.lineTo(x, size.height);
    }
    const startY = ((origin.y % spacing) + spacing) % spacing;
    for (let y = startY; y < size.height; y += spacing) {
        ctx.moveTo(0, y);
        ctx.lineTo(size.width, y);
    }

    ctx.stroke();
    ctx.restore();
};

const renderCompass = (ctx: CanvasRenderingContext2D, drawable: CompassDrawable): void => {
    const { center, tip, label, style } = drawable;
    ctx.save();
    applyStroke(ctx, style);
    ctx.lineJoin = 'round';
    ctx.beginPath();
    ctx.moveTo(center.x, center.y);
    ctx.lineTo(tip.x, tip.y);
    ctx.stroke();

    ctx.fillStyle = style.labelColor;
    ctx.font = '10px monospace';
    ctx.textAlign = 'center';
    ctx.fillText(label, center.x, center.y + 14);
    ctx.restore();
};

const renderPolyline = (ctx: CanvasRenderingContext2D, drawable: PolylineDrawable): void => {
    if (drawable.points.length < 2) {
        return;
    }
    ctx.save();
    applyStroke(ctx, drawable.style);
    ctx.lineJoin = 'round';
    ctx.beginPath();
    tracePath(ctx, drawable.points);
    ctx.stroke();
    ctx.restore();
};

const renderSegment = (ctx: CanvasRenderingContext2D, drawable: SegmentDrawable): void => {
    ctx.save();
    applyStroke(ctx, drawable.style);
    ctx.beginPath();
    ctx.moveTo(drawable.start.x, drawable.start.y);
    ctx.lineTo(drawable.end.x, drawable.end.y);
    ctx.stroke();
    ctx.restore();
};

const renderCircle = (ctx: CanvasRenderingContext2D, drawable: CircleDrawable): void => {
    ctx.save();
    ctx.beginPath();
    ctx.arc(drawable.center.x, drawable.center.y, drawable.radius, 0, Math.PI * 2);
    fillAndStroke(ctx, drawable.style);
    ctx.restore();
};

const renderRect = (ctx: CanvasRenderingContext2D, drawable: RectDrawable): void => {
    const { center, width, height, rotation, style } = drawable;
    ctx.save();
    ctx.translate(center.x, center.y);
    if (Math.abs(rotation) > 1e-6) {
        ctx.rotate(rotation);
    }
    ctx.beginPath();
    ctx.rect(-width / 2, -height / 2, width, height);
    fillAndStroke(ctx, style);
    ctx.restore();
};

const renderPolygon = (ctx: CanvasRenderingContext2D, drawable: PolygonDrawable): void => {
    if (drawable.points.length < 3) {
        return;
    }
    ctx.save();
    ctx.beginPath();
    tracePath(ctx, drawable.points);
    ctx.closePath();
    fillAndStroke(ctx, drawable.style);
    ctx.restore();
};

// =============================================================================
// MAIN RENDER FUNCTION
// =============================================================================

export interface RenderOptions {
    /** Fill color painted over the whole canvas before drawing. */
    background?: string;
}

/**
 * Clear the canvas and render drawables in list order (back to front).
 */
export const renderDrawables = (
    ctx: CanvasRenderingContext2D,
    drawables: readonly Drawable[],
    canvasSize: { width: number; height: number },
    options?: RenderOptions,
): void => {
    ctx.clearRect(0, 0, canvasSize.width, canvasSize.height);
    if (options?.background) {
        ctx.save();
        ctx.fillStyle = options.background;
        ctx.fillRect(0, 0, canvasSize.width, canvasSize.height);
        ctx.restore();
    }

    for (const drawable of drawables) {
        switch (drawable.type) {
            case 'grid':
                renderGrid(ctx, drawable);
                break;
            case 'compass':
                renderCompass(ctx, drawable);
                break;
            case 'polyline':
                renderPolyline(ctx, drawable);
                break;
            case 'segment':
                renderSegment(ctx, drawable);
                break;
            case 'circle':
                renderCircle(ctx, drawable);
                break;
            case 'rect':
                renderRect(ctx, drawable);
                break;
            case 'polygon':
                renderPolygon(ctx, drawable);
                break;
        }
    }
};
