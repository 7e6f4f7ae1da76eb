export { ProcessEnvironment } from './process-environment.js';
export { MemoryEnvironment } from './memory-environment.js';
