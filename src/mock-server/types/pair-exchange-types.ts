/**
 * Pair exchange types for the mock server.
 * Models the answers the mock gives on the pair route.
 */

import type { PairRecipe } from '../../shared/schemas';
import type { PairResponseBody } from '../../shared/types';

export type { PairRecipe };

/** Result from PairMock matching */
export interface PairMatchResult {
  /** Recipe that answered, null when the fallback (or an error) did */
  recipe: PairRecipe | null;
  status: number;
  contentType: string;
  /** Serialized response body */
  body: string;
  /** Parsed form of body on success */
  payload: PairResponseBody | null;
}

/** A named recipe table */
export interface RecipeBook {
  name: string;
  recipes: PairRecipe[];
}
