export * from './cursor';
export * from './classify';
export * from './navigate';
