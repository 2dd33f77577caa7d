/**
 * @boostsmith/core
 * Source acquisition, build and install pipeline
 */

export * from './install/index.js';
