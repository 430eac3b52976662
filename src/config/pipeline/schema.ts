/**
 * Pipeline configuration schema.
 *
 * A configuration is built once from one file and never changes afterwards:
 * every sample unit of a run must see the same options, and the merge step
 * must see the ones the samples saw.
 */

import { z } from "zod";

/** Environment module name accepted from a `module load` line. */
export const ModuleNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.+/-]+$/, "module names may only contain letters, digits and _ . + / -");

export const PipelineConfigSchema = z
  .object({
    reference: z.string(),
    db: z.string(),
    anchor: z.string(),
    outDirectory: z.string(),
    matrix: z.string(),
    references: z.string(),
    matrices: z.string(),
    tracks: z.string(),
    assembly: z.string(),
    window: z.string(),
    correlationThreshold: z.string(),
    pValueThreshold: z.string(),
    qValueThreshold: z.string(),
    correlationMethod: z.string(),
    figures: z.string(),
    figureWidth: z.string(),
    zoom: z.string(),
    colours: z.string(),

    /** File the options were read from; handed to every analysis unit */
    sourcePath: z.string().min(1),

    /** Environment modules each launched unit loads before it starts */
    moduleDirectives: z.array(ModuleNameSchema),

    /** Options the core does not recognize, kept verbatim */
    extras: z.record(z.string()),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
