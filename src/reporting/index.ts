export { consoleProgress } from './progress.js';
export { defaultRenderDuration, defaultRenderNumber } from './render-numbers.js';
export type { RendererOptions } from './renderer.js';
export { renderTable } from './renderer.js';
export type { RenderOptions } from './report.js';
export { EvaluationResults } from './report.js';
export { ScoreResults } from './scores.js';
