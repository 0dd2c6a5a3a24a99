import * as fs from 'fs';
import * as path from 'path';

/**
 * Writes data to a temporary file beside the target and renames it into place.
 * When a mode is given it is applied explicitly, since writeFileSync honours the umask.
 */
export function atomicWriteFileSync(targetPath: string, data: string | NodeJS.ArrayBufferView, mode?: number): void {
  const tempPath = temporaryPathFor(targetPath);

  try {
    fs.writeFileSync(tempPath, data, mode === undefined ? undefined : { mode });
    if (mode !== undefined) {
      fs.chmodSync(tempPath, mode);
    }
    fs.renameSync(tempPath, targetPath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Points `linkPath` at `target`, replacing whatever was there in one rename.
 */
export function atomicSymlinkSync(target: string, linkPath: string): void {
  const tempPath = temporaryPathFor(linkPath);

  try {
    fs.symlinkSync(target, tempPath);
    fs.renameSync(tempPath, linkPath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

function temporaryPathFor(targetPath: string): string {
  return path.join(
    path.dirname(targetPath),
    `${path.basename(targetPath)}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`,
  );
}
