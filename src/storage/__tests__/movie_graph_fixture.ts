/**
 * Loads the small movie graph used by storage and pipeline tests.
 */

import { readFileSync } from 'fs';
import type { Triple } from '../sqlite_graph_store.js';

interface FixtureFile {
  triples: [string, string, string][];
}

export function loadMovieGraphFixture(): Triple[] {
  const raw = readFileSync(new URL('../../__tests__/fixtures/small_movie_graph.json', import.meta.url), 'utf-8');
  const fixture: FixtureFile = JSON.parse(raw);
  return fixture.triples.map(([subject, predicate, object]) => ({ subject, predicate, object }));
}
