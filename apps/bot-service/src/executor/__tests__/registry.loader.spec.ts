import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RegistryLoadError } from '@app/shared/errors/command.errors';
import { loadRegistry, parseExecutorsFile } from '../registry.loader';

describe('parseExecutorsFile', () => {
  it('should read the map format', () => {
    const templates = parseExecutorsFile('{"echo":"echo {{payload}}","ls":"ls {{payload}}"}');

    expect(templates).toEqual([
      { name: 'echo', template: 'echo {{payload}}' },
      { name: 'ls', template: 'ls {{payload}}' },
    ]);
  });

  it('should read the list format', () => {
    const templates = parseExecutorsFile(
      JSON.stringify({ executors: [{ name: ' echo ', template: 'echo {{payload}}' }] }),
    );

    expect(templates).toEqual([{ name: 'echo', template: 'echo {{payload}}' }]);
  });

  it('should accept an empty map', () => {
    expect(parseExecutorsFile('{}')).toEqual([]);
  });

  it('should reject invalid JSON', () => {
    expect(() => parseExecutorsFile('{"echo":', 'executors.json')).toThrow(RegistryLoadError);
    expect(() => parseExecutorsFile('{"echo":', 'executors.json')).toThrow(
      /^Failed to load executors from executors\.json: invalid JSON/,
    );
  });

  it('should reject entries without a template', () => {
    expect(() => parseExecutorsFile('{"executors":[{"name":"x"}]}')).toThrow(RegistryLoadError);
  });

  it('should reject non-string templates', () => {
    expect(() => parseExecutorsFile('{"echo":5}')).toThrow(RegistryLoadError);
  });
});

describe('loadRegistry', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'executors-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeExecutors(content: string): string {
    const filePath = join(dir, 'executors.json');
    writeFileSync(filePath, content);
    return filePath;
  }

  it('should build the registry from a file', () => {
    const registry = loadRegistry(writeExecutors('{"echo":"echo {{payload}}"}'));

    expect(registry.names()).toEqual(['echo']);
  });

  it('should let the later duplicate win', () => {
    const registry = loadRegistry(
      writeExecutors(
        JSON.stringify({
          executors: [
            { name: 'echo', template: 'echo A {{payload}}' },
            { name: 'echo', template: 'echo B {{payload}}' },
          ],
        }),
      ),
    );

    expect(registry.size).toBe(1);
    expect(registry.lookup('echo')?.template).toBe('echo B {{payload}}');
  });

  it('should keep executors with malformed templates', () => {
    const registry = loadRegistry(writeExecutors('{"uptime":"uptime"}'));

    expect(registry.lookup('uptime')?.template).toBe('uptime');
  });

  it('should load an empty registry', () => {
    expect(loadRegistry(writeExecutors('{}')).isEmpty()).toBe(true);
  });

  it('should fail when the file is missing', () => {
    expect(() => loadRegistry(join(dir, 'missing.json'))).toThrow(
      `Failed to load executors from ${join(dir, 'missing.json')}: file not found`,
    );
  });
});
