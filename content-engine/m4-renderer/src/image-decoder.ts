import { Err, ModuleError, Ok, Result } from '../../shared/types.js';
import { ImageFormat } from './types.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(data: Buffer, signature: number[]): boolean {
  return data.length >= signature.length && signature.every((byte, i) => data[i] === byte);
}

/**
 * Identify an embeddable raster format from its magic bytes
 */
export function detectImageFormat(data: Buffer, correlationId: string = 'render'): Result<ImageFormat, ModuleError[]> {
  if (startsWith(data, PNG_SIGNATURE)) {
    return Ok<ImageFormat>('PNG');
  }
  if (startsWith(data, JPEG_SIGNATURE)) {
    return Ok<ImageFormat>('JPEG');
  }
  return Err([{
    code: 'E-M4-IMAGE-UNDECODABLE',
    module: 'M4-Renderer',
    data: { bytes: data.length, head: data.subarray(0, 8).toString('hex') },
    correlationId
  }]);
}
