/**
 * MIME detection from magic bytes.
 */

import { fileTypeFromBuffer } from 'file-type';

import type { MimeDetector } from '../../core/ports.js';

export const fileTypeMimeDetector: MimeDetector = {
  async detect(data) {
    const detected = await fileTypeFromBuffer(data);
    return detected?.mime ?? null;
  },
};
