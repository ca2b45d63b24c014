export { createMarketContext } from "./createMarketContext";
export type { MarketContext } from "./createMarketContext";
export { createVenue } from "./createVenue";
export type { VenueBindings } from "./createVenue";
