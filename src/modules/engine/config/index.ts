export { engineConfig } from './engine.config';
