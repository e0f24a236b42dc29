export * from './base.error';
export * from './decode.error';
export * from './transform.error';
export * from './encode.error';
export * from './config.error';
