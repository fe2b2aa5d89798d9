/**
 * Engine Module - Public API
 */

export { EngineService, engineService } from './services/engine.service';
export { SidecarEngine, parseSidecarMessage, decodePcm16 } from './services/sidecar-engine';
export * from './types';
export { engineConfig } from './config';
