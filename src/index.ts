export * from './errors';
export * from './logger';
export * from './config';
export * from './message/index';
export * from './router/index';
export * from './transport/adapter';
export * from './transport/http';
export * from './p2p/index';
export * from './server';
export * from './client/index';
