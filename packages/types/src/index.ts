/**
 * @openramp/types
 *
 * Shared domain types for the accessibility engine.
 *
 * - Spot: a recorded accessibility feature and its serialized record
 * - Codec: conversion between spots and records
 * - Score: the 0-100 neighborhood score and its terms
 * - Geo: coordinates
 */

export * from "./spot.js";
export * from "./codec.js";
export * from "./score.js";
export * from "./geo.js";
