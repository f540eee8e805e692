/**
 * Pair route matcher for the mock server.
 * Answers `GET .../pair?first=..&second=..` from a recipe table, with the
 * same body shape as the real API.
 */

import * as fsp from 'fs/promises';
import { API_ROUTES, MOCK_FALLBACK_RESULT } from '../shared/constants';
import { recipeFileSchema } from '../shared/schemas';
import type { PairResponseBody } from '../shared/types';
import type { PairMatchResult, PairRecipe, RecipeBook } from './types/pair-exchange-types';

const JSON_CONTENT_TYPE = 'application/json';

/**
 * Load and validate a JSON recipe table
 */
export async function loadRecipeBook(filePath: string): Promise<RecipeBook> {
  const raw = await fsp.readFile(filePath, { encoding: 'utf-8' });
  return {
    name: filePath,
    recipes: recipeFileSchema.parse(JSON.parse(raw)),
  };
}

/**
 * PairMock - matches pair requests to recipes, in either order.
 */
export class PairMock {
  private recipes: PairRecipe[] = [];
  private fallback: PairResponseBody = { ...MOCK_FALLBACK_RESULT };

  addRecipeBook(book: RecipeBook): void {
    this.recipes.push(...book.recipes);
  }

  addRecipe(recipe: PairRecipe): void {
    this.recipes.push(recipe);
  }

  /**
   * Answer for pairs without a recipe
   */
  setFallback(fallback: PairResponseBody): void {
    this.fallback = { ...fallback };
  }

  /**
   * Returns null when the request is not for the pair route.
   */
  match(method: string, url: string): PairMatchResult | null {
    if (method.toUpperCase() !== 'GET') return null;

    const { pathname, searchParams } = new URL(url, 'http://localhost');
    if (!this.pathMatches(pathname)) return null;

    const first = searchParams.get('first');
    const second = searchParams.get('second');
    if (first === null || second === null) {
      return {
        recipe: null,
        status: 400,
        contentType: JSON_CONTENT_TYPE,
        body: JSON.stringify({ error: "Query parameters 'first' and 'second' are required" }),
        payload: null,
      };
    }

    const recipe = this.findRecipe(first, second);
    const payload: PairResponseBody = recipe
      ? { result: recipe.result, emoji: recipe.emoji, isNew: recipe.isNew }
      : { ...this.fallback };

    return {
      recipe,
      status: 200,
      contentType: JSON_CONTENT_TYPE,
      body: JSON.stringify(payload),
      payload,
    };
  }

  getRecipeCount(): number {
    return this.recipes.length;
  }

  reset(): void {
    this.recipes = [];
    this.fallback = { ...MOCK_FALLBACK_RESULT };
  }

  private findRecipe(first: string, second: string): PairRecipe | null {
    for (const recipe of this.recipes) {
      if (recipe.first === first && recipe.second === second) return recipe;
      if (recipe.first === second && recipe.second === first) return recipe;
    }
    return null;
  }

  private pathMatches(requestPath: string): boolean {
    // Partial path match, so any API prefix in front of the route works
    const normalized = requestPath.replace(/\/+$/, '').toLowerCase();
    return normalized.endsWith(API_ROUTES.PAIR);
  }
}
