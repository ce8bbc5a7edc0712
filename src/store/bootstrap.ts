import type { Store } from "./postgres.js";

/** Creates the metadata table and indexes if they do not exist yet. */
export async function bootstrap(store: Store): Promise<void> {
  await store.execMulti(store.dialect.filesTableSQL());
}
