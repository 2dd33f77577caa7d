/**
 * @boostsmith/git
 * Source acquisition for boostsmith
 */

export * from './types.js';
export * from './client/index.js';
