import { z } from "zod/v4";
import { ConfigurationError } from "../core/errors";
import type { RunRequest } from "../core/schemas";

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

const runRequestInputSchema = z
  .object({
    source_url: z.string().refine(isHttpUrl, "must be an http(s) URL"),
    max_pages: z.number().int().min(1),
    delay_seconds: z.number().min(0),
    max_block_chars: z.number().int().positive(),
    min_block_chars: z.number().int().positive(),
  })
  .refine((r) => r.min_block_chars <= r.max_block_chars, {
    message: "must not exceed max_block_chars",
    path: ["min_block_chars"],
  });

/**
 * Validate a submission and freeze it as the run's snapshot.
 * @throws ConfigurationError listing every problem found
 */
export function validateRunRequest(input: unknown): Readonly<RunRequest> {
  const parsed = runRequestInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => {
        const field = issue.path.map(String).join(".");
        return field ? `${field}: ${issue.message}` : issue.message;
      })
    );
  }
  return Object.freeze(parsed.data);
}
