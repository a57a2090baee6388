/**
 * bean-keeper - A minimal named-bean registry with field injection for Node.js
 *
 * @module bean-keeper
 */

// Export registry functionality
export * from './src/container';

// Export binder and lifecycle hook
export * from './src/binder';

// Export injection descriptors
export * from './src/decorator';

// Export options, errors and logger port
export * from './src/options';
export * from './src/errors';
export * from './src/logger';
export { isAssignable, typeName } from './src/type-check';
