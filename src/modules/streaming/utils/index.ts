export {
  StreamFault,
  ValidationFault,
  ResolutionFault,
  BusyFault,
  GenerationFault,
  TransportFault,
  toStreamFault,
  isRequestScoped,
} from './faults';
export { createWavHeader, STREAMING_DATA_SIZE, STREAMING_RIFF_SIZE } from './wav-header';
