/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface-based repository pattern
 * - Separation of interface and implementation
 */

export * from "./interfaces";
export * from "./postgres";
