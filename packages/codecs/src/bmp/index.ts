export { BmpCodec, toRgba } from './codec'
export { decodeBmp, readBmpHeader } from './decoder'
export { encodeBmp, writeBmp } from './encoder'
export { buildChannelMask, headerKindOf, parseHeader } from './header'
export { Palette, readPalette } from './palette'
export { type PixelFormat, decodeRow, expandBits, formatChannels, selectPixelFormat } from './pixels'
export { type RleCommand, RleDecompressor, RleState, decompressRle, readRleCommand } from './rle'
export { ScanlineAssembler, rowStride, visibleRow } from './scanline'
export * from './types'
