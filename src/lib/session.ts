import type { ExpandedSubtopic, KnowledgeTree, Subtopic } from './agents/types';

export type ExplorerState = {
  tree: KnowledgeTree | null;
  /** Set when the tree is a placeholder produced after a failed generation. */
  treeWarning: string | null;
  /** Bumped whenever the tree is replaced or cleared. */
  treeVersion: number;
  currentSubtopic: string | null;
  /** Expansions fetched so far for the current tree, keyed by subtopic name. */
  expansions: ReadonlyMap<string, ExpandedSubtopic>;
};

export type ExplorerAction =
  | { type: 'treeLoaded'; tree: KnowledgeTree; warning?: string }
  | { type: 'subtopicSelected'; name: string }
  | { type: 'expansionLoaded'; treeVersion: number; name: string; expansion: ExpandedSubtopic }
  | { type: 'reset' };

export const initialExplorerState: ExplorerState = {
  tree: null,
  treeWarning: null,
  treeVersion: 0,
  currentSubtopic: null,
  expansions: new Map(),
};

export function explorerReducer(state: ExplorerState, action: ExplorerAction): ExplorerState {
  switch (action.type) {
    case 'treeLoaded':
      return {
        tree: action.tree,
        treeWarning: action.warning ?? null,
        treeVersion: state.treeVersion + 1,
        currentSubtopic: null,
        expansions: new Map(),
      };
    case 'subtopicSelected':
      if (!state.tree?.subtopics.some(s => s.name === action.name)) return state;
      return { ...state, currentSubtopic: action.name };
    case 'expansionLoaded':
      // A response requested for an earlier tree arrives late; drop it.
      if (!state.tree || action.treeVersion !== state.treeVersion) return state;
      return {
        ...state,
        expansions: new Map(state.expansions).set(action.name, action.expansion),
      };
    case 'reset':
      return { ...initialExplorerState, treeVersion: state.treeVersion + 1 };
  }
}

export function selectCurrentSubtopic(state: ExplorerState): Subtopic | undefined {
  if (state.currentSubtopic === null) return undefined;
  return state.tree?.subtopics.find(s => s.name === state.currentSubtopic);
}

export function selectCurrentExpansion(state: ExplorerState): ExpandedSubtopic | undefined {
  if (state.currentSubtopic === null) return undefined;
  return state.expansions.get(state.currentSubtopic);
}
