export * from './adapter';
export * from './client';
export * from './framing';
export * from './identity';
export * from './node';
export * from './wire';
