/**
 * Image codecs
 */

export * from './bmp'
