export const NAME = 'cycleforge';
export const VERSION = '0.1.0';
