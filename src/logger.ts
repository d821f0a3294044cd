/**
 * policy-wasm — Debug loggers
 *
 * Enable with `DEBUG=policy-wasm:*`.
 */

import Debug from 'debug';

export const runtimeLog = Debug('policy-wasm:runtime');
export const engineLog = Debug('policy-wasm:engine');
export const contextLog = Debug('policy-wasm:context');
export const bundleLog = Debug('policy-wasm:bundle');
