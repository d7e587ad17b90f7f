import pluralize from 'pluralize';

/**
 * Word inflection used to guess the conventional `<collection>/<element>`
 * partial path of an object render (`render(@post)` -> `posts/_post`).
 */
export type Inflector = {
  pluralize: (word: string) => string;
  singularize: (word: string) => string;
};

/**
 * English inflection rules, backed by the `pluralize` package.
 */
export const englishInflector: Inflector = {
  pluralize: word => pluralize.plural(word),
  singularize: word => pluralize.singular(word)
};
