export * from './hooks/use-dynamic-connection';
