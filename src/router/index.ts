export * from './dispatcher';
export * from './index-endpoint';
export * from './router';
export * from './types';
