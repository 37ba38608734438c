export * from './vault';
export * from './user';
export * from './recommendation';
export * from './validation';
export * from './attributes';
