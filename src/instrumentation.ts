import { initTracing } from './observability/tracing';

// Imported first by server.ts so auto-instrumentation patches express and mongoose on load
initTracing();
