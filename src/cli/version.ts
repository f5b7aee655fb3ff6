/**
 * Version and metadata for the orderkit CLI
 */

export const version = '0.1.0';
export const name = 'orderkit';
export const description = 'Create and inspect orders through the Admin APIs of a commerce platform';

