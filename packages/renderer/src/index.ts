/**
 * Stylized QR rendering engine
 */

export * from "./encoder.js";
export * from "./finder.js";
export * from "./surface.js";
export * from "./module-renderer.js";
export * from "./eye-renderer.js";
export * from "./frame-surface.js";
export * from "./picture.js";
export * from "./exporter.js";
export * from "./painter.js";
export * from "./ascii-renderer.js";
