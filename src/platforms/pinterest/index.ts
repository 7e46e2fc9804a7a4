export { PlaywrightBrowserDriver } from "./playwright-driver";
export { PinterestHtmlExtractor, extractPinsFromHtml, normalizeApiPin } from "./parsers";
export { PinterestPinDetailSource } from "./pin-detail";
export { PinterestSearchApi, extractCredentials, parseSearchResponse, END_BOOKMARK } from "./search-api";
export { PINTEREST_SELECTORS, buildSearchUrl, buildPinUrl } from "./selectors";
