/**
 * Aggregate library statistics from the Stash GraphQL API. The resolver
 * computes these server side, so the query stays cheap on large libraries.
 */
export const LIBRARY_STATS_QUERY = `
query LibraryStats {
  stats {
    scene_count
    scenes_size
    image_count
    images_size
    performer_count
    studio_count
  }
}
`;

export const LIBRARY_STATS_OPERATION = "LibraryStats";
