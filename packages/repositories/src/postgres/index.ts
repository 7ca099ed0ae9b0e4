export { createDrizzleEventStore, createEventRepository, createPostgresEventRepository } from "./event-repository";
