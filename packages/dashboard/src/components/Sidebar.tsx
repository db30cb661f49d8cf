import { useCallback, useEffect, useRef, type MouseEvent } from "react";
import { getTracer, loadSidebarConfig, type SidebarConfigInput } from "@telltale/core";
import { useSidebarStore } from "@/stores/sidebar-store";
import { CanvasPainter, type SidebarImages } from "@/lib/canvas-painter";
import { renderSidebar } from "@/lib/renderer";
import { handlePointerRelease, toLogicalPoint } from "@/lib/hit-test";
import { DEFAULT_PANEL_HEIGHT, PANEL_WIDTH } from "@/lib/sidebar-config";
import { cn } from "@/lib/utils";

export interface SidebarProps {
  onOpenSettings: () => void;
  images?: SidebarImages;
  height?: number;
  config?: SidebarConfigInput;
  className?: string;
}

export function Sidebar({
  onOpenSettings,
  images,
  height = DEFAULT_PANEL_HEIGHT,
  config,
  className,
}: SidebarProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const sidebar = useSidebarStore((s) => s.sidebar);
  const { showWifiAddress, debug } = loadSidebarConfig(config ?? {});

  useEffect(() => {
    getTracer().setDebugMode(debug);
  }, [debug]);

  useEffect(() => {
    const log = getTracer().createTrace("sidebar");
    const ctx = canvasRef.current?.getContext("2d");
    if (!ctx) {
      log.debug({ scope: "paint", op: "render", msg: "no 2d context, skipping paint" });
      return;
    }
    renderSidebar(new CanvasPainter(ctx, images), sidebar, { height, showWifiAddress });
    log.debug({ scope: "paint", op: "render", msg: "painted sidebar" });
  }, [sidebar, images, height, showWifiAddress]);

  const handleMouseUp = useCallback(
    (event: MouseEvent<HTMLCanvasElement>) => {
      const bounds = event.currentTarget.getBoundingClientRect();
      const point = toLogicalPoint(event.clientX, event.clientY, bounds, PANEL_WIDTH, height);
      if (handlePointerRelease(point, onOpenSettings)) {
        getTracer()
          .createTrace("sidebar")
          .info({ scope: "input", op: "release", msg: "open settings", data: { x: point.x, y: point.y } });
      }
    },
    [onOpenSettings, height]
  );

  return (
    <canvas
      ref={canvasRef}
      data-testid="sidebar-canvas"
      width={PANEL_WIDTH}
      height={height}
      className={cn("block shrink-0", className)}
      onMouseUp={handleMouseUp}
    />
  );
}
