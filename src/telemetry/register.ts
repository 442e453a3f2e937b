/**
 * Preload entry: `node --require ./dist/telemetry/register.js dist/index.js`
 * Starts instrumentation before @grpc/grpc-js is loaded so it can be patched.
 */

import { initializeTelemetry } from './instrumentation';

initializeTelemetry();
