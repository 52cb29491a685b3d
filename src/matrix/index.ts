export * from './validator';
export * from './expander';
export * from './schema';
