import type { FontSpec, Painter, Rect, SidebarImageKey, StrokeStyle, TextStyle } from "@/types";
import { lineHeight, wrapText } from "./text-layout";

/** The slice of CanvasRenderingContext2D the painter uses */
export interface CanvasTarget {
  fillStyle: string | CanvasGradient | CanvasPattern;
  strokeStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  globalAlpha: number;
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  save(): void;
  restore(): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  arcTo(x1: number, y1: number, x2: number, y2: number, radius: number): void;
  ellipse(
    x: number,
    y: number,
    radiusX: number,
    radiusY: number,
    rotation: number,
    startAngle: number,
    endAngle: number
  ): void;
  rect(x: number, y: number, w: number, h: number): void;
  clip(): void;
  fill(): void;
  stroke(): void;
  fillRect(x: number, y: number, w: number, h: number): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { width: number };
  drawImage(image: CanvasImageSource, dx: number, dy: number, dw: number, dh: number): void;
}

export type SidebarImages = Partial<Record<SidebarImageKey, CanvasImageSource>>;

export function cssFont(font: FontSpec): string {
  const weight = font.weight === "Bold" ? "bold " : font.weight === "Medium" ? "500 " : "";
  return `${weight}${font.size}px "${font.family}"`;
}

function roundedRectPath(ctx: CanvasTarget, r: Rect, radius: number): void {
  const rad = Math.max(0, Math.min(radius, r.width / 2, r.height / 2));
  const right = r.x + r.width;
  const bottom = r.y + r.height;
  ctx.beginPath();
  ctx.moveTo(r.x + rad, r.y);
  ctx.arcTo(right, r.y, right, bottom, rad);
  ctx.arcTo(right, bottom, r.x, bottom, rad);
  ctx.arcTo(r.x, bottom, r.x, r.y, rad);
  ctx.arcTo(r.x, r.y, right, r.y, rad);
  ctx.closePath();
}

/**
 * Painter backed by a 2D canvas context. Images that were never loaded are
 * skipped; asset loading belongs to the host.
 */
export class CanvasPainter implements Painter {
  constructor(
    private ctx: CanvasTarget,
    private images: SidebarImages = {}
  ) {}

  fillRect(rect: Rect, color: string): void {
    this.ctx.fillStyle = color;
    this.ctx.fillRect(rect.x, rect.y, rect.width, rect.height);
  }

  fillEllipse(rect: Rect, color: string): void {
    const rx = rect.width / 2;
    const ry = rect.height / 2;
    this.ctx.fillStyle = color;
    this.ctx.beginPath();
    this.ctx.ellipse(rect.x + rx, rect.y + ry, rx, ry, 0, 0, Math.PI * 2);
    this.ctx.fill();
  }

  fillRoundedRect(rect: Rect, radius: number, color: string, clip?: Rect): void {
    this.ctx.save();
    if (clip) {
      this.ctx.beginPath();
      this.ctx.rect(clip.x, clip.y, clip.width, clip.height);
      this.ctx.clip();
    }
    this.ctx.fillStyle = color;
    roundedRectPath(this.ctx, rect, radius);
    this.ctx.fill();
    this.ctx.restore();
  }

  strokeRoundedRect(rect: Rect, radius: number, stroke: StrokeStyle): void {
    this.ctx.strokeStyle = stroke.color;
    this.ctx.lineWidth = stroke.width;
    roundedRectPath(this.ctx, rect, radius);
    this.ctx.stroke();
  }

  drawText(rect: Rect, text: string, style: TextStyle): void {
    this.ctx.font = cssFont(style.font);
    this.ctx.fillStyle = style.color;
    this.ctx.textBaseline = "top";

    const lines = wrapText(text, rect.width, (t) => this.ctx.measureText(t).width, style.wrap ?? false);
    const step = lineHeight(style.font.size);

    if (style.align === "center") {
      this.ctx.textAlign = "center";
      const cx = rect.x + rect.width / 2;
      const top = rect.y + (rect.height - lines.length * step) / 2;
      lines.forEach((line, i) => this.ctx.fillText(line, cx, top + i * step));
    } else {
      this.ctx.textAlign = "left";
      lines.forEach((line, i) => this.ctx.fillText(line, rect.x, rect.y + i * step));
    }
  }

  drawImage(image: SidebarImageKey, rect: Rect, opacity: number): void {
    const source = this.images[image];
    if (!source) return;
    this.ctx.save();
    this.ctx.globalAlpha = opacity;
    this.ctx.drawImage(source, rect.x, rect.y, rect.width, rect.height);
    this.ctx.restore();
  }
}
