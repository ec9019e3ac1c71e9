export const NAME = 'lambdacore';
export const VERSION = '0.3.0';
