import { describe, expect, it } from "vitest";
import { LogLevel, buildLeveledLogger } from "./logger";
import { mockLogger } from "../testing/bplist-fixture";

describe('buildLeveledLogger', () => {
  it('drops levels below the configured one', () => {
    const sink = mockLogger();
    const logger = buildLeveledLogger({ logger: sink, level: LogLevel.warn });

    logger.debug('DBG: hidden');
    logger.info('hidden');
    logger.warn('WARN: shown %d', 1);
    logger.error('shown');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('WARN: shown %d', 1);
    expect(sink.error).toHaveBeenCalledWith('shown');
  });

  it('drops everything when silent', () => {
    const sink = mockLogger();
    const logger = buildLeveledLogger({ logger: sink, level: LogLevel.silent });

    logger.error('hidden');
    logger.group('hidden');
    logger.groupEnd();

    expect(sink.error).not.toHaveBeenCalled();
    expect(sink.group).not.toHaveBeenCalled();
    expect(sink.groupEnd).not.toHaveBeenCalled();
  });
});
