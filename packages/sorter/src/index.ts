export * from './errors';
export * from './processor';
export { compareNames, sortLocalsBlock, sortRequiredProvidersInBlock, sortResourceParams } from './sorters';
