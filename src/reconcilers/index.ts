/**
 * Reconcilers module - workspace link state management
 *
 * @module reconcilers
 */

export * as links from './links/index.js';
export * as editor from './editor/index.js';
