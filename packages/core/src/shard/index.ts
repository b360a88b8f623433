export * from './planner';
export * from './archive';
export * from './builder';
