/**
 * @telltale/dashboard
 * Renderer, input handling and React component for the Telltale sidebar
 */

export * from "./types";
export * from "./lib/sidebar-config";
export * from "./lib/renderer";
export * from "./lib/text-layout";
export * from "./lib/hit-test";
export { CanvasPainter, cssFont, type CanvasTarget, type SidebarImages } from "./lib/canvas-painter";
export { useSidebarStore } from "./stores/sidebar-store";
export { Sidebar, type SidebarProps } from "./components/Sidebar";
