import { describe, it, expect } from 'vitest';
import * as errors from './errors.js';

describe('Shared Error Factory (src/errors.ts)', () => {
  it('domainError helper constructs the correct shape', () => {
    const err = errors.domainError('Test message');
    expect(err).toEqual({
      isError: true,
      content: [{ type: 'text', text: 'Test message' }],
    });
  });

  describe('thrown errors', () => {
    it('MalformedPathError carries offset and command', () => {
      const err = new errors.MalformedPathError('oops', 7, 'C');
      expect(err).toBeInstanceOf(errors.PathDataError);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe('MalformedPathError');
      expect(err.offset).toBe(7);
      expect(err.command).toBe('C');
    });

    it('MalformedPathError defaults to no command', () => {
      expect(new errors.MalformedPathError('oops', 0).command).toBeNull();
    });

    it('UnsupportedCommandError names the command and offset', () => {
      const err = new errors.UnsupportedCommandError('a', 12);
      expect(err).toBeInstanceOf(errors.PathDataError);
      expect(err.name).toBe('UnsupportedCommandError');
      expect(err.message).toBe("Unsupported path command 'a' at offset 12.");
    });

    it('InvalidConfigError prefixes the details', () => {
      expect(new errors.InvalidConfigError('width: too small').message).toBe(
        'Invalid converter configuration: width: too small',
      );
    });
  });

  describe('input errors', () => {
    it('noPathData', () => {
      expect(errors.noPathData().content[0].text).toBe('Provide exactly one of "path_data" or "path_file".');
    });

    it('pathFileNotFound', () => {
      expect(errors.pathFileNotFound('/tmp/missing.txt').content[0].text).toBe(
        'Path data file not found: /tmp/missing.txt',
      );
    });
  });

  describe('conversion errors', () => {
    it('malformedPath includes the command when known', () => {
      const withCommand = errors.malformedPath(new errors.MalformedPathError('bad args', 3, 'L'));
      expect(withCommand.content[0].text).toBe("Malformed path data at offset 3 (command 'L'): bad args");

      const withoutCommand = errors.malformedPath(new errors.MalformedPathError("Unexpected character '#'.", 5));
      expect(withoutCommand.content[0].text).toBe("Malformed path data at offset 5: Unexpected character '#'.");
    });

    it('unsupportedCommand', () => {
      const response = errors.unsupportedCommand(new errors.UnsupportedCommandError('T', 4));
      expect(response.isError).toBe(true);
      expect(response.content[0].text).toBe(
        "Path command 'T' at offset 4 cannot be converted. Quadratic and arc segments are not supported; rewrite them as cubic curves or disable strict mode to drop them.",
      );
    });

    it('invalidConfig passes the error message through', () => {
      expect(errors.invalidConfig(new errors.InvalidConfigError('height: bad')).content[0].text).toBe(
        'Invalid converter configuration: height: bad',
      );
    });
  });

  describe('output errors', () => {
    it('cannotWritePath', () => {
      expect(errors.cannotWritePath('/root/out.json').content[0].text).toBe('Cannot write to path: /root/out.json');
    });
  });
});
