export * from './verb.types';
export * from './preferences.types';
export * from './failure.types';
export * from './pronunciation.types';
export * from './search.types';
