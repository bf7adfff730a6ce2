/**
 * @aeroprofile/types
 *
 * Shared domain types for the route elevation profile engine.
 *
 * - Geo: coordinates, positions, raw terrain samples
 * - Route: waypoints, the route source, live aircraft
 * - Profile: legs, leg lists, projection and query results
 */

export * from "./geo.js";
export * from "./route.js";
export * from "./profile.js";
