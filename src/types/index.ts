export type * from './rehab';
export type * from './session';
export type * from './exercise';
