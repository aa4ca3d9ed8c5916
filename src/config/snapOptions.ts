import { z } from "zod";
import { ConfigurationError } from "../utils/errors";

const WAIT_PATTERN = /^(load|dom|networkidle|\d+s)$/;

const nonNegativeInt = () => z.number().int().nonnegative();

export const SnapOptionsSchema = z.object({
  urls: z.array(z.string().min(1)).min(1, "At least one URL is required"),
  outDir: z.string().min(1).default("out"),
  stitch: z.boolean().default(false),
  width: z.number().int().positive().default(1280),
  height: z.number().int().positive().default(1000),
  scale: z.number().positive().default(1),
  wait: z
    .string()
    .regex(WAIT_PATTERN, "Expected load, dom, networkidle or <seconds>s")
    .default("networkidle"),
  scrollDelayMs: nonNegativeInt().default(350),
  tileOverlap: nonNegativeInt().default(80),
  stickyTop: nonNegativeInt().default(0),
  stickyBottom: nonNegativeInt().default(0),
  capHeight: z.number().int().positive().default(50000),
  maxTiles: z.number().int().positive().default(150),
  idleTimeoutMs: z.number().int().positive().default(5000),
  cookies: z.string().min(1).optional(),
  userDataDir: z.string().min(1).optional(),
  mobile: z.boolean().default(false),
  headless: z.boolean().default(true)
});

export type SnapOptions = z.infer<typeof SnapOptionsSchema>;

export function parseSnapOptions(input: unknown): SnapOptions {
  const result = SnapOptionsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid options: ${details}`);
  }
  return result.data;
}
