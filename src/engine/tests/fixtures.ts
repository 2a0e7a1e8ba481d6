import pino from 'pino';
import { fromValue } from '../../document/from-value';
import { type DocumentNode, ScalarNode } from '../../document/nodes';
import type { Logger } from '../../logger';
import * as t from '../../types/builders';
import type { RecordDescriptor } from '../../types/descriptors';

/**
 * Shared records and helpers for the engine suites.
 */

export interface Point {
  x: number;
  y: number;
}

export const Point = t.record<Point>({
  name: 'Point',
  create: () => ({ x: 0, y: 0 }),
  members: { x: t.int32(), y: t.int32() }
});

export interface Enemy {
  name: string;
  hp: number;
}

export const Enemy = t.record<Enemy>({
  name: 'Enemy',
  create: () => ({ name: '', hp: 0 }),
  members: { name: t.string(), hp: t.int32() }
});

export interface Tree {
  label: string;
  children: Tree[];
}

export const Tree: RecordDescriptor<Tree> = t.record<Tree>({
  name: 'Tree',
  create: () => ({ label: '', children: [] }),
  members: {
    label: t.string(),
    children: () => t.sequence(Tree)
  }
});

/** Builds a document from plain data, located under `source`. */
export function doc(value: unknown, source = 'test'): DocumentNode {
  return fromValue(value, source);
}

export function scalar(text: string, source = 'test'): ScalarNode {
  return new ScalarNode(text, { source });
}

export type LogLine = Record<string, unknown>;

/**
 * A debug-level pino logger writing parsed JSON lines into `lines`.
 */
export function captureLogs(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      }
    }
  );
  return { logger, lines };
}
