/**
 * Repository Interfaces
 */

export * from "./event-repository";
