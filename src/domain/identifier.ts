/**
 * Unique id model.
 *
 * A UniqueId is an immutable path of typed segments from the session root
 * to a node, e.g. `[engine:unit]/[class:Calculator]/[method:adds()]`.
 * Consumers work with segments; the string form exists only at the
 * serialization boundary (listener output, diagnostics, parsing).
 */

import { TypedError, malformedIdentifierError } from './errors';

/** Well-known segment types. Any non-empty type is accepted. */
export const SegmentType = {
  Engine: 'engine',
  Class: 'class',
  Method: 'method',
  TestFactory: 'test-factory',
  DynamicTest: 'dynamic-test',
  DynamicContainer: 'dynamic-container',
} as const;

export interface Segment {
  readonly type: string;
  readonly value: string;
}

const SEGMENT_PATTERN = /^\[([^\[\]]*)\]$/;
const ENCODED_PATTERN = /%(25|5B|5D|2F|3A)/gi;

const DECODED: Record<string, string> = {
  '25': '%',
  '5B': '[',
  '5D': ']',
  '2F': '/',
  '3A': ':',
};

function encodePart(text: string, encodeColon: boolean): string {
  let out = text
    .replace(/%/g, '%25')
    .replace(/\[/g, '%5B')
    .replace(/\]/g, '%5D')
    .replace(/\//g, '%2F');
  if (encodeColon) out = out.replace(/:/g, '%3A');
  return out;
}

function decodePart(text: string): string {
  return text.replace(ENCODED_PATTERN, (match, hex: string) => DECODED[hex.toUpperCase()] ?? match);
}

/** Thrown when a string does not follow the `[type:value]/…` grammar. */
export class MalformedIdentifierError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'MalformedIdentifierError';
  }
}

export class UniqueId {
  private readonly text: string;

  private constructor(readonly segments: readonly Segment[]) {
    this.text = segments
      .map((s) => `[${encodePart(s.type, true)}:${encodePart(s.value, false)}]`)
      .join('/');
  }

  static root(type: string, value: string): UniqueId {
    return new UniqueId([UniqueId.segment(type, value)]);
  }

  static forEngine(engineId: string): UniqueId {
    return UniqueId.root(SegmentType.Engine, engineId);
  }

  /** Parse the canonical string form. Fails on the first offending token. */
  static parse(input: string): UniqueId {
    if (input.length === 0) {
      throw new MalformedIdentifierError(malformedIdentifierError(input, input, 'unique id must not be empty'));
    }
    const segments = input.split('/').map((token) => {
      const match = SEGMENT_PATTERN.exec(token);
      if (!match) {
        throw new MalformedIdentifierError(
          malformedIdentifierError(input, token, 'segment must be enclosed in square brackets'),
        );
      }
      const body = match[1];
      const colon = body.indexOf(':');
      if (colon < 0) {
        throw new MalformedIdentifierError(
          malformedIdentifierError(input, token, 'segment must separate type and value with ":"'),
        );
      }
      if (colon === 0) {
        throw new MalformedIdentifierError(malformedIdentifierError(input, token, 'segment type must not be empty'));
      }
      return { type: decodePart(body.slice(0, colon)), value: decodePart(body.slice(colon + 1)) };
    });
    return new UniqueId(segments);
  }

  private static segment(type: string, value: string): Segment {
    if (type.length === 0) {
      throw new MalformedIdentifierError(
        malformedIdentifierError(`[${type}:${value}]`, `[${type}:${value}]`, 'segment type must not be empty'),
      );
    }
    return Object.freeze({ type, value });
  }

  /** A new id with one more segment; this id is unchanged. */
  append(type: string, value: string): UniqueId {
    return new UniqueId([...this.segments, UniqueId.segment(type, value)]);
  }

  /** The enclosing id, or undefined for a root id. */
  parent(): UniqueId | undefined {
    if (this.segments.length <= 1) return undefined;
    return new UniqueId(this.segments.slice(0, -1));
  }

  lastSegment(): Segment {
    return this.segments[this.segments.length - 1];
  }

  /** Root segment; by convention the engine that owns the node. */
  engineSegment(): Segment {
    return this.segments[0];
  }

  /** True when `prefix` equals this id or one of its ancestors. */
  hasPrefix(prefix: UniqueId): boolean {
    if (prefix.segments.length > this.segments.length) return false;
    return prefix.segments.every(
      (s, i) => s.type === this.segments[i].type && s.value === this.segments[i].value,
    );
  }

  equals(other: UniqueId): boolean {
    return this.segments.length === other.segments.length && this.hasPrefix(other);
  }

  toString(): string {
    return this.text;
  }
}
