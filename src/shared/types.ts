export const CATEGORIES = ['web', 'fetch', 'local'] as const;

export type Category = typeof CATEGORIES[number];

export type CategoryFilter = Category | 'all';

export const PHASES = ['created', 'planning', 'executing', 'synthesizing', 'complete', 'error'] as const;

export type Phase = typeof PHASES[number];

export interface SessionHandle {
  id: string;
  dir: string;
  createdAt: string;
}

export interface SessionMeta {
  sessionId: string;
  createdAt: string;
  version: string;
}

export interface SessionSummary {
  id: string;
  dir: string;
  createdAt: string;
  phase: Phase | null;
  findingCount: number;
  latest: boolean;
}

export interface Finding {
  sessionId: string;
  category: Category;
  filename: string;
  path: string;
  content: string;
}

export interface StatusRecord {
  sessionId: string;
  phase: Phase;
  message: string;
  timestamp: string;
}

export interface OutputArtifact {
  sessionId: string;
  path: string;
  content: string;
  findingCount: number;
}
