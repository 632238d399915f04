import { z } from "zod";
import { DEFAULT_MESSAGE_TEMPLATE, DEFAULT_REMOTE } from "#/constants";

// Identity used for the annotated tag (git config user.name / user.email)
export const GitIdentitySchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().trim().email(),
});
export type GitIdentity = z.infer<typeof GitIdentitySchema>;

// Log levels accepted from config, CLI flags and LOG_LEVEL
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

// tagbump.yaml at the repository root; every field is optional
export const TagbumpConfigSchema = z.object({
  remote: z.string().trim().min(1).default(DEFAULT_REMOTE),
  fetchTags: z.boolean().default(true),
  messageTemplate: z.string().min(1).default(DEFAULT_MESSAGE_TEMPLATE),
  identity: GitIdentitySchema.optional(),
});
export type TagbumpConfig = z.infer<typeof TagbumpConfigSchema>;
