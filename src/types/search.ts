export type SearchDomain = "messages" | "users" | "rooms";

export const SEARCH_DOMAINS: readonly SearchDomain[] = ["messages", "users", "rooms"];

export type SearchMode = "lexical" | "semantic" | "hybrid";

export type DocumentMetadata = Record<string, unknown>;

export type MessageDocument = {
  messageId: string;
  content: string;
  userId: string;
  roomId: string;
  timestamp: string;
  messageType: string;
  metadata: DocumentMetadata;
};

export type UserDocument = {
  userId: string;
  username: string;
  email: string;
  metadata: DocumentMetadata;
};

export type RoomDocument = {
  roomId: string;
  name: string;
  description: string;
  members: string[];
  metadata: DocumentMetadata;
};

export type SearchDocumentMap = {
  messages: MessageDocument;
  users: UserDocument;
  rooms: RoomDocument;
};

export type SearchDocument = SearchDocumentMap[SearchDomain];

export type MessageInput = {
  id?: string | null;
  content: string;
  userId: string;
  roomId: string;
  type?: string | null;
  metadata?: DocumentMetadata | null;
};

export type UserInput = {
  id: string;
  username: string;
  email: string;
  metadata?: DocumentMetadata | null;
};

export type RoomInput = {
  id: string;
  name: string;
  description?: string | null;
  members: string[];
  metadata?: DocumentMetadata | null;
};

export type SearchInputMap = {
  messages: MessageInput;
  users: UserInput;
  rooms: RoomInput;
};

export type FilterValue = string | number | boolean;

export type SearchFilters = Record<string, FilterValue>;

export type SearchIntent = {
  query: string;
  filters?: SearchFilters | null;
  context?: string | null;
  limit?: number | null;
  /** Requesting user. Room searches are scoped to rooms this user belongs to. */
  userId?: string | null;
};

export type SearchResult<TDocument = SearchDocument> = {
  id: string;
  score: number | null;
  document: TDocument;
};
