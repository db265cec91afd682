export type { BatchEntry, BatchReport, BatchTotals, JobKind, RenderJob } from "./batch/RenderBatch.js";
export { RenderBatch } from "./batch/RenderBatch.js";
export { ColorParseError, colorsEqual, parseColor, rgba, toHex, toRgba } from "./color/Color.js";
export type { PaletteTable } from "./color/TokenResolver.js";
export { findColor, lookup, normalizeToken, resolvePalette } from "./color/TokenResolver.js";
export { BLEND_MODES, blendChannel, compositePixel, isBlendMode, parseBlendMode } from "./composition/blend.js";
export { Compositor, renderComposition } from "./composition/Compositor.js";
export {
  BACKGROUND_TOKEN,
  DEFAULT_CELL_SIZE,
  DEFAULT_MAX_DEPTH,
  EMPTY_CELL,
  FALLBACK_COLOR,
  MAX_COORDINATE,
  TRANSPARENT,
} from "./config/constants.js";
export type { EngineCVars, RenderOptions } from "./config/engineCVars.js";
export {
  applyEnvOverrides,
  DEFAULT_RENDER_OPTIONS,
  ENV_PREFIX,
  registerEngineCVars,
  renderOptionsFromCVars,
} from "./config/engineCVars.js";
export type { CVarCategory, CVarDesc, CVarHandle, CVarType, CVarValue } from "./console/CVar.js";
export { CVar } from "./console/CVar.js";
export { CVarRegistry } from "./console/CVarRegistry.js";
export type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticLocation,
  RenderResult,
  Severity,
} from "./diagnostics/Diagnostic.js";
export { formatDiagnostic, isFatalKind, RenderAbort } from "./diagnostics/Diagnostic.js";
export { DiagnosticCollector } from "./diagnostics/DiagnosticCollector.js";
export { engineLog, engineLogError, engineLogPath, initEngineLog } from "./log/engineLog.js";
export type * from "./model/types.js";
export { createCatalog } from "./model/types.js";
export { PixelSet } from "./raster/PixelSet.js";
export { rasterize, rasterizeRegion } from "./raster/ShapeRasterizer.js";
export { PixelBuffer } from "./render/PixelBuffer.js";
export { renderNineSlice } from "./render/nineSlice.js";
export { SpriteRenderer, renderSprite, renderSpriteNineSlice } from "./render/SpriteRenderer.js";
export { RenderSession } from "./render/RenderSession.js";
