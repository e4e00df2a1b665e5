export interface ConversationTurn {
  readonly timestamp: string;
  readonly user_input: string;
  readonly assistant_response: string;
  readonly session_id: string;
  readonly context_type: string;
}

export interface UserProfile {
  display_name: string;
  preferences: Record<string, unknown>;
  frequently_used_commands: string[];
  last_interaction: string | null;
}

export interface ContextStats {
  turnCount: number;
  totalTurns: number;
  sessionId: string;
  displayName: string;
  frequentCommands: string[];
  lastInteraction: string | null;
}

export interface ContextStoreOptions {
  file: string;
  maxHistory: number;
  sessionWindow: number;
  autosaveEvery: number;
  displayName: string;
}
