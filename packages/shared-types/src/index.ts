export * from './games';
export * from './stats';
export * from './harvest';
