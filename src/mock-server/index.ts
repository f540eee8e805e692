/**
 * Mock Server - barrel export.
 * Offline stand-in for the pairing API.
 */

export { PairMock, loadRecipeBook } from './pair-mock';
export { MockApiServer, startMockServer } from './mock-api-server';
export type { MockApiServerOptions } from './mock-api-server';

export type { PairMatchResult, PairRecipe, RecipeBook } from './types/pair-exchange-types';
