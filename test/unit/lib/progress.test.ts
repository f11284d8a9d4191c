import { describe, it, expect } from '@jest/globals';
import { Writable } from 'node:stream';
import { createStreamReporter, silentReporter } from '@/lib/progress';

describe('progress reporters', () => {
  it('should write one line per step', () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString('utf8'));
        callback();
      },
    });
    const reporter = createStreamReporter(stream);

    reporter.step('🔐 Logging in to ECR...');
    reporter.step('');

    expect(chunks).toEqual(['🔐 Logging in to ECR...\n', '\n']);
  });

  it('should drop steps when silent', () => {
    expect(silentReporter.step('ignored')).toBeUndefined();
  });
});
