import { randomUUID } from "node:crypto";

import { z } from "zod";

import type {
  MessageDocument,
  RoomDocument,
  SearchDocumentMap,
  SearchDomain,
  UserDocument,
} from "@/types/search";

import { SearchServiceError } from "./errors";

export const DEFAULT_MESSAGE_TYPE = "text";

/** Stored on message documents only; never returned to callers. */
export const MESSAGE_VECTOR_FIELD = "content_vector";

const requiredText = z
  .string()
  .refine((value) => value.trim().length > 0, { message: "must not be blank" });

const metadataSchema = z
  .record(z.string(), z.unknown())
  .nullish()
  .transform((value) => value ?? {});

const messageInputSchema = z.object({
  id: z.string().nullish(),
  content: requiredText,
  userId: requiredText,
  roomId: requiredText,
  type: z.string().nullish(),
  metadata: metadataSchema,
});

const userInputSchema = z.object({
  id: requiredText,
  username: requiredText,
  email: requiredText,
  metadata: metadataSchema,
});

const roomInputSchema = z.object({
  id: requiredText,
  name: requiredText,
  description: z.string().nullish(),
  members: z.array(requiredText),
  metadata: metadataSchema,
});

type DocumentSchemaMap = {
  [D in SearchDomain]: z.ZodType<SearchDocumentMap[D], z.ZodTypeDef, unknown>;
};

const storedMetadataSchema = z.record(z.string(), z.unknown()).default({});

export const documentSchemas: DocumentSchemaMap = {
  messages: z.object({
    messageId: z.string(),
    content: z.string(),
    userId: z.string(),
    roomId: z.string(),
    timestamp: z.string(),
    messageType: z.string(),
    metadata: storedMetadataSchema,
  }),
  users: z.object({
    userId: z.string(),
    username: z.string(),
    email: z.string(),
    metadata: storedMetadataSchema,
  }),
  rooms: z.object({
    roomId: z.string(),
    name: z.string(),
    description: z.string().default(""),
    members: z.array(z.string()),
    metadata: storedMetadataSchema,
  }),
};

function missingFieldError(domain: SearchDomain, error: z.ZodError): SearchServiceError {
  const fields = Array.from(
    new Set(
      error.issues
        .map((issue) => issue.path[0])
        .filter((segment): segment is string => typeof segment === "string"),
    ),
  );
  const label = fields.length ? fields.join(", ") : "document";
  return new SearchServiceError(
    "missing_field",
    `Cannot index ${domain} document: missing or invalid ${label}`,
    { domain, fields },
  );
}

export function prepareMessageDocument(input: unknown, timestamp: Date): MessageDocument {
  const parsed = messageInputSchema.safeParse(input);
  if (!parsed.success) throw missingFieldError("messages", parsed.error);
  const { id, content, userId, roomId, type, metadata } = parsed.data;
  const messageId = id?.trim() || randomUUID();
  return {
    messageId,
    content,
    userId,
    roomId,
    timestamp: timestamp.toISOString(),
    messageType: type?.trim() || DEFAULT_MESSAGE_TYPE,
    metadata,
  };
}

export function prepareUserDocument(input: unknown): UserDocument {
  const parsed = userInputSchema.safeParse(input);
  if (!parsed.success) throw missingFieldError("users", parsed.error);
  const { id, username, email, metadata } = parsed.data;
  return { userId: id.trim(), username, email, metadata };
}

export function prepareRoomDocument(input: unknown): RoomDocument {
  const parsed = roomInputSchema.safeParse(input);
  if (!parsed.success) throw missingFieldError("rooms", parsed.error);
  const { id, name, description, members, metadata } = parsed.data;
  return {
    roomId: id.trim(),
    name,
    description: description ?? "",
    members: Array.from(new Set(members.map((member) => member.trim()))),
    metadata,
  };
}

export function parseDocument<D extends SearchDomain>(
  domain: D,
  value: unknown,
): SearchDocumentMap[D] | null {
  const parsed = documentSchemas[domain].safeParse(value);
  return parsed.success ? parsed.data : null;
}
