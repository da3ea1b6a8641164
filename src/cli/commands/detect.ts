import { detectFormat, firstSignificantChar } from '../../protocol/detect.js';
import { UnrecognizedFormatError } from '../../protocol/errors.js';

export function runDetect(raw: string): void {
  const format = detectFormat(raw);
  if (format === 'unrecognized') {
    throw new UnrecognizedFormatError(firstSignificantChar(raw));
  }
  console.log(format);
}
