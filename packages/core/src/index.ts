export * from './product';
export * from './catalog';
export * from './recommend';
