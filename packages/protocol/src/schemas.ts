import { z } from "zod";

const UUID_V4_LOWERCASE_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

export const ClientIdSchema = z.string().min(1);

export const FileIdSchema = z
  .string()
  .regex(UUID_V4_LOWERCASE_REGEX, "file id must be lowercase UUID v4");

const TimestampSchema = z.number().int().nonnegative();

export const VersionSchema = z.number().int().nonnegative();

export const MAX_SENDER_NAME_LENGTH = 64;

// Free-form display name; the server trims it and drops it when blank.
export const SenderNameSchema = z.string().max(256);

// Client -> server intents

export const TextSubmitMessageSchema = z.object({
  type: z.literal("text"),
  content: z.string(),
  version: VersionSchema,
  senderName: SenderNameSchema.optional(),
});

export const ClearMessageSchema = z.object({
  type: z.literal("clear"),
});

export const FileMetaRequestMessageSchema = z.object({
  type: z.literal("file_meta_request"),
});

export const FileDeleteMessageSchema = z.object({
  type: z.literal("file_delete"),
  id: FileIdSchema,
});

export const HeartbeatMessageSchema = z.object({
  type: z.literal("heartbeat"),
  ts: TimestampSchema.optional(),
});

// Server -> client events

export const FileMetaSchema = z.object({
  id: FileIdSchema,
  filename: z.string().min(1),
  mimeType: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
  uploadedAt: TimestampSchema,
  expiresAt: TimestampSchema,
  uploadedByName: z.string().min(1).max(MAX_SENDER_NAME_LENGTH).optional(),
});

export const WelcomeMessageSchema = z.object({
  type: z.literal("welcome"),
  clientId: ClientIdSchema,
});

const ClipboardTextFields = {
  content: z.string(),
  version: VersionSchema,
  updatedBy: ClientIdSchema.nullable(),
  updatedByName: z.string().min(1).max(MAX_SENDER_NAME_LENGTH).optional(),
  updatedAt: TimestampSchema,
};

export const TextUpdateMessageSchema = z.object({
  type: z.literal("text_update"),
  ...ClipboardTextFields,
});

// Sent only to the submitter of a stale update; carries the state to rebase on.
export const TextConflictMessageSchema = z.object({
  type: z.literal("text_conflict"),
  ...ClipboardTextFields,
});

export const FileListMessageSchema = z.object({
  type: z.literal("file_list"),
  files: z.array(FileMetaSchema),
});

export const FileAddedMessageSchema = FileMetaSchema.extend({
  type: z.literal("file_added"),
});

export const FileRemovedMessageSchema = z.object({
  type: z.literal("file_removed"),
  id: FileIdSchema,
});

export const PresenceMessageSchema = z.object({
  type: z.literal("presence"),
  count: z.number().int().nonnegative(),
});

export const ErrorMessageSchema = z.object({
  type: z.literal("error"),
  code: z.string().min(1),
  message: z.string().min(1),
});

export const FileListResponseSchema = z.object({
  files: z.array(FileMetaSchema),
});

export const ClientToServerMessageSchema = z.union([
  TextSubmitMessageSchema,
  ClearMessageSchema,
  FileMetaRequestMessageSchema,
  FileDeleteMessageSchema,
  HeartbeatMessageSchema,
]);

export const ServerToClientMessageSchema = z.union([
  WelcomeMessageSchema,
  TextUpdateMessageSchema,
  TextConflictMessageSchema,
  FileListMessageSchema,
  FileAddedMessageSchema,
  FileRemovedMessageSchema,
  PresenceMessageSchema,
  ErrorMessageSchema,
]);

export type ClientId = z.infer<typeof ClientIdSchema>;
export type FileId = z.infer<typeof FileIdSchema>;
export type TextSubmitMessage = z.infer<typeof TextSubmitMessageSchema>;
export type ClearMessage = z.infer<typeof ClearMessageSchema>;
export type FileMetaRequestMessage = z.infer<typeof FileMetaRequestMessageSchema>;
export type FileDeleteMessage = z.infer<typeof FileDeleteMessageSchema>;
export type HeartbeatMessage = z.infer<typeof HeartbeatMessageSchema>;
export type FileMeta = z.infer<typeof FileMetaSchema>;
export type WelcomeMessage = z.infer<typeof WelcomeMessageSchema>;
export type TextUpdateMessage = z.infer<typeof TextUpdateMessageSchema>;
export type TextConflictMessage = z.infer<typeof TextConflictMessageSchema>;
export type FileListMessage = z.infer<typeof FileListMessageSchema>;
export type FileAddedMessage = z.infer<typeof FileAddedMessageSchema>;
export type FileRemovedMessage = z.infer<typeof FileRemovedMessageSchema>;
export type PresenceMessage = z.infer<typeof PresenceMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type FileListResponse = z.infer<typeof FileListResponseSchema>;
export type ClientToServerMessage = z.infer<typeof ClientToServerMessageSchema>;
export type ServerToClientMessage = z.infer<typeof ServerToClientMessageSchema>;
