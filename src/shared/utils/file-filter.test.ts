import { describe, expect, it } from 'vitest';
import { classifyFile, createFileFilter } from './file-filter';

describe('classifyFile', () => {
  it('excludes .DS_Store at any depth', () => {
    expect(classifyFile('.DS_Store')).toBe('exclude');
    expect(classifyFile('assets/img/.DS_Store')).toBe('exclude');
  });

  it('flags other dotfiles', () => {
    expect(classifyFile('.env')).toBe('warn');
    expect(classifyFile('config/.htaccess')).toBe('warn');
  });

  it('includes regular files', () => {
    expect(classifyFile('index.html')).toBe('include');
    expect(classifyFile('.well-known/security.txt')).toBe('include');
  });

  it('normalizes backslash separators', () => {
    expect(classifyFile('assets\\.DS_Store')).toBe('exclude');
  });
});

describe('createFileFilter', () => {
  it('excludes files matching extra globs by name', () => {
    const filter = createFileFilter(['*.map']);
    expect(filter('js/app.js.map')).toBe('exclude');
    expect(filter('js/app.js')).toBe('include');
  });

  it('matches globs containing a slash against the relative path', () => {
    const filter = createFileFilter(['drafts/**']);
    expect(filter('drafts/post.md')).toBe('exclude');
    expect(filter('posts/drafts.md')).toBe('include');
  });

  it('lets an extra glob exclude a dotfile', () => {
    const filter = createFileFilter(['.env*']);
    expect(filter('.env.local')).toBe('exclude');
    expect(filter('.npmrc')).toBe('warn');
  });
});
