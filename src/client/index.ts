export * from './args';
export * from './request';
export * from './response-type';
