import fs from 'fs';
import * as nifti from 'nifti-reader-js';
import { InvalidVolumeError, NotFoundError, isNotFound } from './errors';

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const data = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(data).set(bytes);
  return data;
}

/** Image dimensions `dim[1..dim[0]]` of a .nii or .nii.gz volume. */
export async function readNiftiDimensions(filePath: string): Promise<number[]> {
  let raw: Buffer;
  try {
    raw = await fs.promises.readFile(filePath);
  } catch (err) {
    if (isNotFound(err)) throw new NotFoundError(filePath, 'NIfTI file');
    throw err;
  }

  let data = toArrayBuffer(raw);
  if (nifti.isCompressed(data)) {
    const inflated = nifti.decompress(data);
    if (!(inflated instanceof ArrayBuffer)) {
      throw new InvalidVolumeError(filePath, 'could not decompress volume');
    }
    data = inflated;
  }
  if (!nifti.isNIFTI(data)) {
    throw new InvalidVolumeError(filePath, 'missing NIfTI magic');
  }

  const header = nifti.readHeader(data);
  if (!header) {
    throw new InvalidVolumeError(filePath, 'unreadable header');
  }
  const rank = header.dims[0];
  if (!Number.isInteger(rank) || rank < 1 || rank > 7) {
    throw new InvalidVolumeError(filePath, `invalid dimension count ${rank}`);
  }
  return header.dims.slice(1, 1 + rank);
}
