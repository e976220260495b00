export * from './detection.types';
export { RenderDetector, DEFAULT_RENDER_THRESHOLD } from './render-detector';
