export { Renderer, brandingFingerprint, documentTitle, escapeHtml, DEFAULT_RENDER_TIMEOUT_MS } from './renderer.js';
export type { RendererOptions } from './renderer.js';
export { FileAssetLoader, detectImageFormat, isFontFile } from './assets.js';
export type { AssetLoader, ImageFormat } from './assets.js';
export { parseHexColor, cssColorVariables } from './color.js';
export type { RGB } from './color.js';
export { TEMPLATE_IDS, resolveTemplate, isTemplateId } from './templates.js';
export type { TemplateId, TemplateLayout } from './templates.js';
