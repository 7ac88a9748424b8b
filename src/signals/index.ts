export { priceDifference, type PriceDifference } from "./price-difference.js";
export { minPrice, maxPrice } from "./min-max.js";
export { windowedSma } from "./sma.js";
