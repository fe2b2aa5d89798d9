export {
  AudioFragmentAssembler,
  applyFadeIn,
  toPcm16Bytes,
  type AssembledFrame,
  type AssemblerOptions,
  type Fragment,
} from './audio-assembler.service';
export { MetricsAggregator, type Clock } from './metrics-aggregator.service';
export {
  StreamingOrchestrator,
  streamingOrchestrator,
  nextOrAbort,
  type StreamingOrchestratorDeps,
} from './streaming-orchestrator.service';
