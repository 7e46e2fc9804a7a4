export const PINTEREST_SELECTORS = {
  HOME_URL: "https://www.pinterest.com",
  SEARCH_PATH: "/search/pins/",
  SEARCH_RESOURCE_PATH: "/resource/BaseSearchResource/get/",

  PINS: {
    PIN_ITEM: '[data-test-id="pin"], [data-grid-item="true"], div[role="listitem"]',
    PIN_LINK: 'a[href*="/pin/"]',
  },

  DATA_SCRIPTS: ["script#__PWS_DATA__", "script#__PWS_INITIAL_PROPS__"],
} as const;

export function buildSearchUrl(keyword: string): string {
  return `${PINTEREST_SELECTORS.HOME_URL}${PINTEREST_SELECTORS.SEARCH_PATH}?q=${encodeURIComponent(keyword)}&rs=typed`;
}

export function buildPinUrl(pinId: string): string {
  return `${PINTEREST_SELECTORS.HOME_URL}/pin/${pinId}/`;
}
