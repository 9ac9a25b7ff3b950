export { RetrievalTracer, normalizeRetrievedIds, DISABLED_SPAN } from './retrieval-tracer.js';
export type { TraceRow, TraceableItem, RetrievalTracerOptions } from './retrieval-tracer.js';
