export function pageOffset(page: number, perPage: number): number {
  return (page - 1) * perPage;
}

/** Never below 1, so an empty catalog still reports one (empty) page. */
export function totalPages(total: number, perPage: number): number {
  return Math.max(1, Math.ceil(total / perPage));
}

/** Escapes LIKE wildcards so the term matches literally with `ESCAPE '\'`. */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}
