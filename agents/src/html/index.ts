export { cleanText, extractListing, resolveHref, type ListingItem, type ListingSelectors } from './listing.js';
export { parseSearchResults, type SearchResult } from './search-results.js';
