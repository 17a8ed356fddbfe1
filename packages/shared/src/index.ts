export * from './listDocument';
export * from './labels';
export * from './listMutations';
