// Git types
export * from './git.types';

// Resource types
export * from './resource.types';

// Config types
export * from './config.types';
