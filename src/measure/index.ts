export * from './vec2d.js';
export * from './vec3d.js';
export * from './direction.js';
