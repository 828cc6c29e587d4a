import * as assert from 'assert';

import { Logger, createLogger, silentLogger } from '../src/utils/logger';
import { MemorySink } from './helpers';

describe('test logger', function() {
  it('test line format', function() {
    const sink = new MemorySink();
    const logger = createLogger({ name: 'app', sink });
    logger.info('hello');
    logger.warn('careful', { n: 1, s: 'x' });
    logger.error('quoted', 'text');
    assert.deepEqual(sink.lines, [
      '[app] INFO: hello',
      '[app] WARN: careful {"n":1,"s":"x"}',
      '[app] ERROR: quoted "text"',
    ]);
  });

  it('test default name', function() {
    const sink = new MemorySink();
    new Logger({ sink }).info('x');
    assert.deepEqual(sink.lines, ['[luafuscate] INFO: x']);
  });

  it('test levels', function() {
    const sink = new MemorySink();
    const logger = createLogger({ name: 'app', level: 'warn', sink });
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    assert.deepEqual(sink.lines, ['[app] WARN: c', '[app] ERROR: d']);
    assert.ok(logger.enabled('error'));
    assert.ok(!logger.enabled('info'));
  });

  it('test children share level and sink', function() {
    const sink = new MemorySink();
    const root = createLogger({ name: 'app', level: 'info', sink });
    const child = root.child('step').child('inner');
    child.debug('hidden');
    root.setLevel('debug');
    child.debug('shown');
    assert.equal(child.getLevel(), 'debug');
    assert.deepEqual(sink.lines, ['[app:step:inner] DEBUG: shown']);
  });

  it('test payloads that do not serialize', function() {
    const sink = new MemorySink();
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    const logger = createLogger({ name: 'app', sink });
    logger.info('cyclic', cyclic);
    logger.info('missing', undefined);
    logger.info('bigint', BigInt(7));
    assert.deepEqual(sink.lines, ['[app] INFO: cyclic [object Object]', '[app] INFO: missing', '[app] INFO: bigint 7']);
  });

  it('test silent', function() {
    const logger = silentLogger();
    assert.equal(logger.getLevel(), 'silent');
    assert.ok(!logger.enabled('error'));
  });
});
