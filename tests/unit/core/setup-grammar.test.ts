import { describe, it, expect } from 'vitest';
import {
  objectPathForSource,
  parseDirective,
  stripComment,
  variantObjectPath,
  variantSidecarName,
} from '../../../src/core/setup-grammar.js';
import { MalformedDirectiveError } from '../../../src/core/errors.js';

describe('parseDirective', () => {
  it('splits a directive into structured fields', () => {
    expect(parseDirective('zlib zlibmodule.c -DUSE_ZLIB_CRC32 -I/tools/deps/include -lz')).toEqual({
      extension: 'zlib',
      variant: 'default',
      sources: ['zlibmodule.c'],
      defines: ['USE_ZLIB_CRC32'],
      includes: ['/tools/deps/include'],
      links: ['z'],
      frameworks: [],
      linkerArgs: [],
    });
  });

  it('keeps archive names whole', () => {
    expect(parseDirective('_foo foo.c -l:libfoo.a')?.links).toEqual(['libfoo.a']);
    expect(parseDirective('_foo foo.c -Xlinker libfoo.a')?.links).toEqual(['libfoo.a']);
    expect(parseDirective('_foo foo.c /tools/deps/lib/libfoo.a', { strict: true })?.links)
      .toEqual(['/tools/deps/lib/libfoo.a']);
  });

  it('reads hidden links, frameworks and linker arguments', () => {
    const parsed = parseDirective('_scproxy _scproxy.c -Xlinker -hidden-lcrypto -framework CoreFoundation -Xlinker -dead_strip -L/opt/lib');
    expect(parsed?.links).toEqual(['crypto']);
    expect(parsed?.frameworks).toEqual(['CoreFoundation']);
    expect(parsed?.linkerArgs).toEqual(['-dead_strip', '-L/opt/lib']);
  });

  it('reads the variant tag', () => {
    expect(parseDirective('foo foo.c VARIANT=b')?.variant).toBe('b');
  });

  it('accepts C++ and Objective-C sources', () => {
    expect(parseDirective('_objc a.m b.cc c.cpp')?.sources).toEqual(['a.m', 'b.cc', 'c.cpp']);
  });

  it('ignores comments and blank lines', () => {
    expect(parseDirective('   # nothing here')).toBeNull();
    expect(parseDirective('')).toBeNull();
    expect(parseDirective('_json _json.c # speedups')?.sources).toEqual(['_json.c']);
    expect(stripComment('  math mathmodule.c  # libm ')).toBe('math mathmodule.c');
  });

  it('fails when -framework has no argument', () => {
    expect(() => parseDirective('_scproxy _scproxy.c -framework')).toThrow(MalformedDirectiveError);
  });

  it('rejects unknown tokens only in strict mode', () => {
    expect(parseDirective('math mathmodule.c $(LIBM)')?.sources).toEqual(['mathmodule.c']);
    expect(() => parseDirective('math mathmodule.c $(LIBM)', { strict: true }))
      .toThrow("unexpected token '$(LIBM)': math mathmodule.c $(LIBM)");
  });
});

describe('object paths', () => {
  it('keeps source directories from 3.11 on', () => {
    expect(objectPathForSource('_ctypes/_ctypes.c', '3.11.4')).toBe('Modules/_ctypes/_ctypes.o');
    expect(objectPathForSource('_ctypes/_ctypes.c', '3.10.14')).toBe('Modules/_ctypes.o');
    expect(objectPathForSource('_json.c', '3.13.1')).toBe('Modules/_json.o');
  });

  it('names variant objects and sidecars after the extension and variant', () => {
    expect(variantObjectPath('foo', 'b', 'foo/impl.c')).toBe('Modules/VARIANT-foo-b-impl.o');
    expect(variantSidecarName('foo', 'b')).toBe('VARIANT-foo-b.data');
  });
});
