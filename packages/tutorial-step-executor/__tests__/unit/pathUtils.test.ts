import { describe, it, expect } from 'vitest';
import { isWithinRoot, resolveSandboxedPath, resolveWorkspacePath } from '../../src/sandbox/pathUtils.js';
import { PathEscapeError } from '../../src/errors.js';

const root = '/work/root';

describe('resolveSandboxedPath', () => {
  it('should resolve relative paths against the root', () => {
    expect(resolveSandboxedPath('src/a.txt', root)).toBe('/work/root/src/a.txt');
  });

  it('should allow .. segments that stay inside the root', () => {
    expect(resolveSandboxedPath('a/../b.txt', root)).toBe('/work/root/b.txt');
  });

  it('should accept names that merely start with two dots', () => {
    expect(resolveSandboxedPath('..foo', root)).toBe('/work/root/..foo');
  });

  it('should reject paths escaping the root', () => {
    expect(() => resolveSandboxedPath('../x', root)).toThrow(PathEscapeError);
    expect(() => resolveSandboxedPath('a/../../x', root)).toThrow(
      'Path escapes the working directory: a/../../x'
    );
  });

  it('should reject absolute paths', () => {
    expect(() => resolveSandboxedPath('/etc/passwd', root)).toThrow('Absolute paths are not allowed: /etc/passwd');
  });

  it('should reject absolute paths even inside the root', () => {
    expect(() => resolveSandboxedPath('/work/root/a.txt', root)).toThrow(PathEscapeError);
  });

  it('should allow anything with allowUnsafePaths', () => {
    expect(resolveSandboxedPath('../x', root, { allowUnsafePaths: true })).toBe('/work/x');
    expect(resolveSandboxedPath('/tmp/x', root, { allowUnsafePaths: true })).toBe('/tmp/x');
  });

  it('should carry the requested path and root on the error', () => {
    try {
      resolveSandboxedPath('../x', root);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PathEscapeError);
      if (error instanceof PathEscapeError) {
        expect(error.requestedPath).toBe('../x');
        expect(error.root).toBe(root);
      }
    }
  });
});

describe('isWithinRoot', () => {
  it('should treat the root itself as inside', () => {
    expect(isWithinRoot('/work/root', root)).toBe(true);
  });

  it('should not confuse sibling prefixes', () => {
    expect(isWithinRoot('/work/rootx/a', root)).toBe(false);
  });
});

describe('resolveWorkspacePath', () => {
  it('should keep absolute paths as they are', () => {
    expect(resolveWorkspacePath('/opt/tool', root)).toBe('/opt/tool');
    expect(resolveWorkspacePath('sub', root)).toBe('/work/root/sub');
  });
});
