export * from './types';
export { unwrap, success } from './response';
