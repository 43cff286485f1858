import { createInMemoryAdapter } from "./createInMemoryAdapter";
import { createRepository, type RepositoryOptions } from "./createRepository";
import type { Repository } from "./types";

/**
 * Creates a repository backed by a fresh in-memory adapter.
 *
 * @example
 * ```typescript
 * import { createInMemoryRepository } from 'repokit';
 *
 * const repository = createInMemoryRepository();
 *
 * await repository.add(new Author({ id: "0", ... }));
 * await repository.commit();
 *
 * await repository.search(Author, { country: "US" });
 * ```
 */
export function createInMemoryRepository(
  options: Omit<RepositoryOptions, "adapter"> = {},
): Repository {
  return createRepository({
    ...options,
    adapter: createInMemoryAdapter(),
  });
}
