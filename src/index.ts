export * from './fitting';
