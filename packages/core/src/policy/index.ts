export * from './schema';
export { ResourceFilter } from './resource-filter';
