export * from './cancellation';
export * from './state-machine';
export * from './build-executor';
export * from './scheduler';
export * from './image-publisher';
export * from './pipeline-runner';
