export * from "./playwrightContext.js";
export * from "./portalProfile.js";
export * from "./portalSession.js";
export * from "./salesListing.js";
