import { readFile, writeFile, rename, rm } from 'fs/promises';
import JSONbig from 'json-bigint';
import { z } from 'zod';
import { logger, errorMessage } from '../logger.js';

// Balances exceed Number.MAX_SAFE_INTEGER, so large integers round-trip as native bigint
const json = JSONbig({ useNativeBigInt: true });

/**
 * Suffix of the sibling file a snapshot is written to before it replaces the target
 */
export const TEMP_SUFFIX = '.tmp';

/**
 * Chat ids are stored as plain JSON integers; very long ones come back as bigint
 */
export const subscriberIdSchema = z
  .union([z.number().int(), z.bigint()])
  .transform((id) => Number(id))
  .refine((id) => Number.isSafeInteger(id), { message: 'chat id is outside the safe integer range' });

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and validate a JSON snapshot.
 *
 * A missing, unreadable, malformed or schema-violating file yields `empty()`:
 * the process keeps running with a cold state instead of failing on startup.
 */
export async function readSnapshot<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  empty: () => T
): Promise<T> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.info({ file: path }, 'Snapshot file does not exist, starting with empty state');
    } else {
      logger.warn({ file: path, error: errorMessage(error) }, 'Failed to read snapshot file');
    }
    return empty();
  }

  let raw: unknown;
  try {
    raw = json.parse(data);
  } catch (error) {
    logger.warn({ file: path, error: errorMessage(error) }, 'Failed to parse snapshot JSON');
    return empty();
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    logger.warn(
      { file: path, issues: result.error.issues.length, error: result.error.issues[0]?.message },
      'Snapshot file has unexpected shape'
    );
    return empty();
  }

  return result.data;
}

/**
 * Atomically replace `path` with the serialized `value`.
 *
 * The snapshot goes to `<path>.tmp` first and is renamed over the target, so the
 * target always holds either the previous or the new complete state. Failures are
 * logged and reported as `false`; they never throw.
 */
export async function writeSnapshot(path: string, value: unknown): Promise<boolean> {
  let data: string;
  try {
    data = json.stringify(value, null, 2);
  } catch (error) {
    logger.error({ file: path, error: errorMessage(error) }, 'Failed to serialize snapshot');
    return false;
  }

  const tempPath = `${path}${TEMP_SUFFIX}`;

  try {
    await writeFile(tempPath, data, 'utf-8');
  } catch (error) {
    logger.error({ file: tempPath, error: errorMessage(error) }, 'Failed to write temp snapshot file');
    return false;
  }

  try {
    await rename(tempPath, path);
  } catch (error) {
    logger.error(
      { file: path, tempFile: tempPath, error: errorMessage(error) },
      'Failed to replace snapshot file'
    );
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn(
        { file: tempPath, error: errorMessage(cleanupError) },
        'Failed to remove orphaned temp snapshot file'
      );
    });
    return false;
  }

  logger.debug({ file: path, bytes: data.length }, 'Snapshot saved');
  return true;
}
