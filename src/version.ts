export const APP_NAME = 'numscope';
export const VERSION = '1.0.0';
