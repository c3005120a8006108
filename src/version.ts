export const NAME = 'mockvault';
export const VERSION = '1.0.0';
