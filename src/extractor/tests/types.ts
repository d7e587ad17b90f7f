import type { Inflector } from '../../inflector';
import type { SyntaxNode } from '../../syntax/nodes';

/**
 * Shared test types for extractor suites.
 */

/**
 * TYPE DEFINITION: Test Scenario
 * Represents a single row of data in a table-driven test.
 *
 * @template T - The type of the expected result.
 */
export type TestScenario<T> = {
  /**
   * A short, unique identifier for the scenario (e.g., "Positional + locals").
   */
  id: string;

  /**
   * A human-readable explanation of the expected behavior.
   */
  description: string;

  /**
   * Positional argument nodes of the render call under test.
   */
  args: SyntaxNode[];

  expected: T;
};

/**
 * Source file used by most suites; its directory is `app/views/posts`.
 */
export const VIEW_NAME = 'app/views/posts/index.html';

/**
 * Inflector with visible output, so tests can tell which word went where.
 */
export const markingInflector: Inflector = {
  pluralize: word => `${word}-many`,
  singularize: word => `${word}-one`
};
