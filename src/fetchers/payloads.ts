export type PageOptions = {
  page?: number;
  pageSize?: number;
  authors?: string[];
};

/** Request body for the uncommented-function listing endpoint. */
export function buildListingPayload(projectId: string, options: PageOptions = {}) {
  return {
    params: [
      projectId,
      {
        page: options.page ?? 1,
        pageSize: options.pageSize ?? 100,
        sortField: "cyclomatic",
        sortOrder: "descend",
        location: "",
        frequentAuthors: options.authors ?? [],
        cyclomatic: { min: 0, max: null },
        isDocCovered: false,
      },
    ],
  };
}

/** Request body for the duplicate-group endpoint. */
export function buildDuplicatePayload(projectId: string, options: PageOptions = {}) {
  return {
    id: projectId,
    page: options.page ?? 1,
    pageSize: options.pageSize ?? 100,
    filter: { search: "", emails: options.authors ?? [] },
    sort: { field: "numFunctions", direction: "desc" },
  };
}
