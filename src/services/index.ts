// Services layer
export * from './chunking';
export * from './contentHasher';
export * from './cycleLock';
export * from './embedding';
export * from './reconciler';
export * from './synchronizer';
export * from './syncStateStore';
export * from './vectorIndex';
