export * from './domain';
export * from './store';
export * from './components/rows';
