/**
 * Scenario configuration types and runtime validation.
 */
import { z } from "zod";

const fileAssertionSchema = z
  .object({
    path: z.string(),
    text: z.string(),
  })
  .strict();

const expectationsSchema = z
  .object({
    exitCode: z.number().int(),
    stdoutText: z.string().optional(),
    stdoutContains: z.string().optional(),
    stderrText: z.string().optional(),
    stderrContains: z.string().optional(),
    stderrJsonSubset: z.unknown().optional(),
    files: z.array(fileAssertionSchema).optional(),
  })
  .strict();

export const scenarioConfigSchema = z
  .object({
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    cmd: z.array(z.string()).nonempty(),
    /** Fed to interactive commands line by line. */
    stdin: z.string().optional(),
    /** Written to .roadmanrc.json in the working directory. */
    config: z.record(z.unknown()).optional(),
    expect: expectationsSchema,
  })
  .strict();

export type FileAssertion = z.infer<typeof fileAssertionSchema>;
export type Expectations = z.infer<typeof expectationsSchema>;
export type ScenarioConfig = z.infer<typeof scenarioConfigSchema>;

/**
 * Fail-fast validation of parsed scenario JSON.
 * Throws with a readable error including the scenario path and the invalid field.
 */
export function validateScenarioConfig(raw: unknown, scenarioPath: string): ScenarioConfig {
  const parsed = scenarioConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue && issue.path.length > 0 ? `'${issue.path.join(".")}' ` : "";
    throw new Error(`Scenario '${scenarioPath}': ${field}${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}
