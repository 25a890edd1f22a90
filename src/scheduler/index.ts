export { orderOptions } from './order.js';
export { resolveOptions } from './resolver.js';
export { DependencyCycleError, UnknownOptionError } from './errors.js';
