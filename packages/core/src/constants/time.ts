/**
 * milliseconds per second conversion constant
 * @description used for converting resource lifetimes between seconds and milliseconds
 */
export const MS_PER_SECOND = 1000;
