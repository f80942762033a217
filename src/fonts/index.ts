export * from './fontCatalog';
