export * from './location';
export * from './macro';
export * from './shell';
export * from './record';
export * from './instance';
