import fs from 'fs';
import path from 'path';
import zlib from 'zlib';
import { InvalidVolumeError, NotFoundError } from '../errors';
import { readNiftiDimensions } from '../nifti-header';
import { makeTempDir, removeDir } from './support';

/** Single-file NIfTI-1 header (`n+1`) with an empty extension block. */
function niftiHeader(dims: number[]): Buffer {
  const buffer = Buffer.alloc(352);
  buffer.writeInt32LE(348, 0);
  dims.forEach((value, index) => buffer.writeInt16LE(value, 40 + index * 2));
  buffer.writeInt16LE(16, 70); // FLOAT32
  buffer.writeInt16LE(32, 72);
  buffer.writeFloatLE(352, 108);
  buffer.write('n+1\0', 344, 'latin1');
  return buffer;
}

describe('readNiftiDimensions', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const write = async (name: string, content: Buffer): Promise<string> => {
    const target = path.join(dir, name);
    await fs.promises.writeFile(target, content);
    return target;
  };

  it('should read dimensions from an uncompressed volume', async () => {
    const file = await write('T1.nii', niftiHeader([3, 256, 256, 176, 1, 1, 1, 1]));

    expect(await readNiftiDimensions(file)).toEqual([256, 256, 176]);
  });

  it('should read dimensions from a gzipped volume', async () => {
    const file = await write('bold.nii.gz', zlib.gzipSync(niftiHeader([4, 64, 64, 36, 120, 1, 1, 1])));

    expect(await readNiftiDimensions(file)).toEqual([64, 64, 36, 120]);
  });

  it('should reject a header with an impossible rank', async () => {
    const file = await write('bad.nii', niftiHeader([0, 1, 1, 1, 1, 1, 1, 1]));

    await expect(readNiftiDimensions(file)).rejects.toThrow('invalid dimension count 0');
  });

  it('should reject files without the NIfTI magic', async () => {
    const file = await write('noise.nii', Buffer.alloc(352, 7));

    await expect(readNiftiDimensions(file)).rejects.toBeInstanceOf(InvalidVolumeError);
  });

  it('should report a missing file as not found', async () => {
    await expect(readNiftiDimensions(path.join(dir, 'absent.nii.gz'))).rejects.toBeInstanceOf(NotFoundError);
  });
});
