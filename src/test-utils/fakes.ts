/**
 * In-process stand-ins for the model client and the course catalog.
 */

import { vi, type Mock } from 'vitest';
import type { ModelClient, ModelRequest, ModelTurn, ToolCallRequest } from '../agent/types.js';
import type { QueryCatalog } from '../agent/query-engine.js';
import { searchResultSet, type CourseCatalog } from '../catalog/types.js';

export interface ScriptedClient extends ModelClient {
  create: Mock<(request: ModelRequest) => Promise<ModelTurn>>;
}

/**
 * A model client that replays the given turns in order. An Error entry is
 * thrown from its call; running out of turns throws too.
 */
export function scriptedClient(...script: Array<ModelTurn | Error>): ScriptedClient {
  const queue = [...script];
  return {
    model: 'test-model',
    create: vi.fn(async (_request: ModelRequest): Promise<ModelTurn> => {
      const next = queue.shift();
      if (next === undefined) {
        throw new Error('No scripted model turn left');
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    }),
  };
}

export function completed(text: string): ModelTurn {
  return { kind: 'completed', text };
}

export function toolCalls(...calls: ToolCallRequest[]): ModelTurn {
  return { kind: 'tool_calls', text: '', calls };
}

export function call(id: string, name: string, args: Record<string, unknown> = {}): ToolCallRequest {
  return { id, name, arguments: args };
}

export interface FakeCatalog extends QueryCatalog {
  search: Mock<CourseCatalog['search']>;
  resolveCourseName: Mock<CourseCatalog['resolveCourseName']>;
  getLessonInfo: Mock<CourseCatalog['getLessonInfo']>;
  getCourseOutline: Mock<CourseCatalog['getCourseOutline']>;
  getCourseTitles: Mock<() => string[]>;
}

/** A catalog with nothing in it; override behaviour per test with mockResolvedValue */
export function fakeCatalog(): FakeCatalog {
  return {
    search: vi.fn<CourseCatalog['search']>(async () => searchResultSet([])),
    resolveCourseName: vi.fn<CourseCatalog['resolveCourseName']>(async () => null),
    getLessonInfo: vi.fn<CourseCatalog['getLessonInfo']>(async () => ({ title: null, link: null })),
    getCourseOutline: vi.fn<CourseCatalog['getCourseOutline']>(async () => null),
    getCourseTitles: vi.fn<() => string[]>(() => []),
  };
}
