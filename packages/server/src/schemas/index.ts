export * from './common.schema.js';
export * from './user.schema.js';
export * from './recipe-attribute.schema.js';
export * from './recipe.schema.js';
