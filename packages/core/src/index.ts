export * from './types';

// Timing core
export * from './anim/errors';
export * from './anim/easing';
export * from './anim/interpolate';
export * from './anim/clock';
export * from './anim/progress';

// Steps, groups and programs
export * from './anim/steps';
export * from './anim/stepGroup';
export * from './anim/program';
export * from './anim/programBuilder';

// Single-value animations + playback helpers
export * from './anim/valueAnimation';
export * from './anim/playback';
