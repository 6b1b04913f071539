/**
 * Tests for FragmentRegistry loading, caching and resolution.
 */
import { describe, it, expect } from 'vitest';
import { FragmentRegistry } from '../../../../src/core/registry/registry.js';
import { DocumentCache } from '../../../../src/core/registry/cache.js';
import { InMemoryContentLoader } from '../../../../src/core/documents/loaders.js';
import type { ContentLoader, StructuralMap } from '../../../../src/core/documents/types.js';
import { Reference } from '../../../../src/core/reference/reference.js';
import {
  CircularReferenceError,
  ErrorCodes,
  LoadError,
  NavigationError,
  NotFoundError,
  ResolutionError,
} from '../../../../src/utils/errors.js';

/**
 * Records every path it is asked to load.
 */
class CountingLoader implements ContentLoader {
  readonly calls: string[] = [];

  constructor(private readonly inner: ContentLoader) {}

  loadMap(path: string): StructuralMap {
    this.calls.push(path);
    return this.inner.loadMap(path);
  }
}

function registryFor(files: Record<string, string>): {
  registry: FragmentRegistry;
  loader: CountingLoader;
} {
  const loader = new CountingLoader(new InMemoryContentLoader(files));
  return { registry: new FragmentRegistry(loader), loader };
}

const CHAINED = {
  'a.yaml': `$ref: 'b.yaml#/foo'`,
  'b.yaml': `
foo:
  $ref: '#/bar'
bar: 42
`,
};

describe('FragmentRegistry', () => {
  describe('get', () => {
    it('should return a document without indirection as-is', () => {
      const { registry } = registryFor({ 'dto.yaml': 'type: object' });

      const fragment = registry.get(Reference.root('dto.yaml'));

      expect(fragment.get('type').asString()).toBe('object');
    });

    it('should follow a cross-file then same-file chain to the terminal value', () => {
      const { registry } = registryFor(CHAINED);

      const fragment = registry.get(Reference.root('a.yaml'));

      expect(fragment.value).toBe(42);
      expect(fragment.reference.toString()).toBe('b.yaml#/bar');
    });

    it('should never return an indirection node', () => {
      const { registry } = registryFor(CHAINED);

      const fragment = registry.get(Reference.root('b.yaml').child('foo'));

      expect(registry.isReferenceNode(fragment.value)).toBe(false);
      expect(registry.get(fragment.reference).equals(fragment)).toBe(true);
    });

    it('should resolve a relative reference against the referring document', () => {
      const { registry, loader } = registryFor({
        'a/b.yaml': `$ref: '../c.yaml#/x/0'`,
        'c.yaml': `
x:
  - first
  - second
`,
      });

      const fragment = registry.get(Reference.root('a/b.yaml'));

      expect(fragment.asString()).toBe('first');
      expect(fragment.reference.toString()).toBe('c.yaml#/x/0');
      expect(loader.calls).toEqual(['a/b.yaml', 'c.yaml']);
    });

    it('should percent-decode pointer segments before using them as keys', () => {
      const { registry } = registryFor({
        'api.yaml': `
paths:
  /pets:
    get:
      summary: List pets
link:
  $ref: '#/paths/%2Fpets/get'
`,
      });

      const link = registry.get(Reference.root('api.yaml')).get('link');

      expect(link.get('summary').asString()).toBe('List pets');
      expect(link.reference.segmentPath).toEqual(['paths', '/pets', 'get']);
    });

    it('should ignore keys next to the reference key', () => {
      const { registry } = registryFor({
        'a.yaml': `
node:
  $ref: '#/target'
  description: ignored
target:
  type: string
`,
      });

      const fragment = registry.get(Reference.root('a.yaml').child('node'));

      expect(fragment.reference.toString()).toBe('a.yaml#/target');
      expect(fragment.keys()).toEqual(['type']);
    });

    it('should treat a non-string reference key as an ordinary map', () => {
      const { registry } = registryFor({ 'a.yaml': 'node:\n  $ref: 5\n' });

      const fragment = registry.get(Reference.root('a.yaml').child('node'));

      expect(fragment.reference.toString()).toBe('a.yaml#/node');
      expect(fragment.get('$ref').asNumber()).toBe(5);
    });

    it('should throw NotFoundError carrying the requested reference', () => {
      const { registry } = registryFor({ 'dto.yaml': 'type: object' });
      const missing = Reference.root('dto.yaml').child('missing');

      try {
        registry.get(missing);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(NotFoundError);
        expect(error).toBeInstanceOf(ResolutionError);
        expect((error as NotFoundError).reference).toBe('dto.yaml#/missing');
        expect((error as NotFoundError).code).toBe(ErrorCodes.NOT_FOUND);
      }
    });

    it('should report the start of a chain whose target is missing', () => {
      const { registry } = registryFor({ 'a.yaml': `ref:\n  $ref: '#/nowhere'\n` });

      expect(() => registry.get(Reference.root('a.yaml').child('ref'))).toThrow(
        'Reference not found: a.yaml#/ref'
      );
    });

    it('should follow a chain through a document whose name has a colon', () => {
      const { registry } = registryFor({
        'root.yaml': `x:\n  $ref: './v1:pet.yaml#/y'\n`,
        'v1:pet.yaml': `y:\n  $ref: 'c.yaml#/z'\n`,
        'c.yaml': 'z: 1\n',
      });

      const fragment = registry.get(Reference.root('root.yaml')).get('x');

      expect(fragment.asNumber()).toBe(1);
      expect(fragment.reference.toString()).toBe('c.yaml#/z');
    });

    it('should propagate load failures', () => {
      const { registry } = registryFor({});

      try {
        registry.get(Reference.root('missing.yaml'));
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(LoadError);
        expect((error as LoadError).code).toBe(ErrorCodes.DOCUMENT_NOT_FOUND);
      }
    });
  });

  describe('getOptional', () => {
    it('should return undefined for a missing key', () => {
      const { registry } = registryFor({ 'dto.yaml': 'type: object' });

      expect(registry.getOptional(Reference.root('dto.yaml').child('missing'))).toBeUndefined();
    });

    it('should treat an explicit null as a present value', () => {
      const { registry } = registryFor({ 'a.yaml': 'nothing: null' });

      const fragment = registry.getOptional(Reference.root('a.yaml').child('nothing'));

      expect(fragment).toBeDefined();
      expect(fragment?.value).toBeNull();
      expect(fragment?.kind).toBe('scalar');
    });
  });

  describe('rawValueAt', () => {
    const files = {
      'a.yaml': `
type: object
items:
  - one
  - two
ref:
  $ref: '#/type'
`,
    };

    it('should return the raw indirection node without following it', () => {
      const { registry } = registryFor(files);

      const raw = registry.rawValueAt(Reference.root('a.yaml').child('ref'));

      expect(raw).toEqual(new Map([['$ref', '#/type']]));
    });

    it('should index lists by numeric segment', () => {
      const { registry } = registryFor(files);

      expect(registry.rawValueAt(Reference.root('a.yaml').child('items', 1))).toBe('two');
    });

    it('should return undefined past the end of a list', () => {
      const { registry } = registryFor(files);

      expect(registry.rawValueAt(Reference.root('a.yaml').child('items', 2))).toBeUndefined();
    });

    it('should reject a non-numeric list index', () => {
      const { registry } = registryFor(files);

      try {
        registry.rawValueAt(Reference.root('a.yaml').child('items', 'first'));
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(NavigationError);
        expect((error as NavigationError).code).toBe(ErrorCodes.INVALID_INDEX);
      }
    });

    it('should reject a list index with a leading zero', () => {
      const { registry } = registryFor(files);

      expect(registry.rawValueAt(Reference.root('a.yaml').child('items', '0'))).toBe('one');
      expect(() => registry.rawValueAt(Reference.root('a.yaml').child('items', '01'))).toThrow(
        "Segment '01' is not a list index in a.yaml#/items/01"
      );
    });

    it('should reject descending into a scalar', () => {
      const { registry } = registryFor(files);

      try {
        registry.rawValueAt(Reference.root('a.yaml').child('type', 'x'));
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(NavigationError);
        expect((error as NavigationError).code).toBe(ErrorCodes.SCALAR_DESCENT);
      }
    });

    it('should skip empty segments', () => {
      const { registry } = registryFor(files);

      expect(registry.rawValueAt(new Reference('a.yaml', ['', 'type', '']))).toBe('object');
    });

    it('should return undefined when a key is absent midway', () => {
      const { registry } = registryFor(files);

      expect(registry.rawValueAt(Reference.root('a.yaml').child('nope', 'deeper'))).toBeUndefined();
    });
  });

  describe('caching', () => {
    it('should load each document once', () => {
      const { registry, loader } = registryFor(CHAINED);

      registry.get(Reference.root('a.yaml'));
      registry.get(Reference.root('a.yaml'));
      registry.get(Reference.root('b.yaml').child('bar'));

      expect(loader.calls).toEqual(['a.yaml', 'b.yaml']);
      expect(registry.loadedDocuments()).toEqual(['a.yaml', 'b.yaml']);
    });

    it('should keep separate registries isolated', () => {
      const loader = new CountingLoader(new InMemoryContentLoader(CHAINED));
      const first = new FragmentRegistry(loader);
      const second = new FragmentRegistry(loader);

      first.loadDocument('b.yaml');
      second.loadDocument('b.yaml');

      expect(loader.calls).toEqual(['b.yaml', 'b.yaml']);
    });

    it('should reuse an injected cache', () => {
      const cache = new DocumentCache();
      const loader = new CountingLoader(new InMemoryContentLoader(CHAINED));
      new FragmentRegistry(loader, { cache }).loadDocument('b.yaml');

      const other = new FragmentRegistry(new InMemoryContentLoader({}), { cache });

      expect(other.get(Reference.root('b.yaml').child('bar')).value).toBe(42);
      expect(loader.calls).toEqual(['b.yaml']);
    });
  });

  describe('indirection limits', () => {
    it('should detect a cycle across documents', () => {
      const { registry } = registryFor({
        'a.yaml': `$ref: 'b.yaml'`,
        'b.yaml': `$ref: 'a.yaml'`,
      });

      try {
        registry.get(Reference.root('a.yaml'));
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(CircularReferenceError);
        expect((error as CircularReferenceError).chain).toEqual(['a.yaml#', 'b.yaml#', 'a.yaml#']);
      }
    });

    it('should detect a node that points at itself', () => {
      const { registry } = registryFor({ 'a.yaml': `loop:\n  $ref: '#/loop'\n` });

      expect(() => registry.get(Reference.root('a.yaml').child('loop'))).toThrow(
        CircularReferenceError
      );
    });

    const LONG_CHAIN = {
      'chain.yaml': `
a:
  $ref: '#/b'
b:
  $ref: '#/c'
c:
  $ref: '#/d'
d: end
`,
    };

    it('should fail a chain longer than maxDepth hops', () => {
      const registry = new FragmentRegistry(new InMemoryContentLoader(LONG_CHAIN), { maxDepth: 2 });

      try {
        registry.get(Reference.root('chain.yaml').child('a'));
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ResolutionError);
        expect((error as ResolutionError).code).toBe(ErrorCodes.MAX_DEPTH_EXCEEDED);
      }
    });

    it('should follow a chain of exactly maxDepth hops', () => {
      const registry = new FragmentRegistry(new InMemoryContentLoader(LONG_CHAIN), { maxDepth: 3 });

      expect(registry.get(Reference.root('chain.yaml').child('a')).asString()).toBe('end');
    });
  });

  describe('referenceKey', () => {
    it('should honour a custom reference key', () => {
      const registry = new FragmentRegistry(
        new InMemoryContentLoader({
          'a.yaml': `
node:
  x-ref: '#/target'
other:
  $ref: '#/target'
target: hit
`,
        }),
        { referenceKey: 'x-ref' }
      );
      const root = Reference.root('a.yaml');

      expect(registry.get(root.child('node')).asString()).toBe('hit');
      expect(registry.get(root.child('other')).reference.toString()).toBe('a.yaml#/other');
    });
  });

  describe('JSON documents', () => {
    it('should resolve references inside JSON', () => {
      const { registry } = registryFor({
        'doc.json': '{"count": 3, "alias": {"$ref": "#/count"}}',
      });

      expect(registry.get(Reference.root('doc.json').child('alias')).asNumber()).toBe(3);
    });
  });
});
