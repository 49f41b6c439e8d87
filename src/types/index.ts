export * from './syntax';
export * from './model';
export * from './analysis';
export * from './options';
