import { Logger } from '@nestjs/common';
import { parseBuffer } from 'music-metadata';

export async function measureDurationSeconds(
  buffer: Buffer,
  contentType: string,
  logger: Logger,
): Promise<number | undefined> {
  try {
    const metadata = await parseBuffer(buffer, contentType);
    const seconds = metadata?.format?.duration;
    if (!seconds || !isFinite(seconds) || seconds <= 0) {
      return undefined;
    }
    return Math.round(seconds);
  } catch (error) {
    logger.warn(`Failed to read audio duration: ${error instanceof Error ? error.message : error}`);
    return undefined;
  }
}
