export interface KeysetRow {
  id: string;
}

/**
 * Stream rows page by page, ordered by id. `fetchPage` receives the last id of
 * the previous page (null for the first page).
 */
export async function* paginateById<T extends KeysetRow>(
  fetchPage: (afterId: string | null, pageSize: number) => Promise<T[]>,
  pageSize: number
): AsyncGenerator<T> {
  let afterId: string | null = null;

  while (true) {
    const page = await fetchPage(afterId, pageSize);
    yield* page;

    if (page.length < pageSize) return;
    afterId = page[page.length - 1].id;
  }
}
