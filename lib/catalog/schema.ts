import { z } from "zod";

const fieldName = z.string().trim().min(1);

const ListRuleSchema = z.object({
  kind: z.literal("list"),
  target: fieldName,
  path: z.array(fieldName),
});

const GroupsRuleSchema = z.object({
  kind: z.literal("groups"),
  target: fieldName,
  path: z.array(fieldName),
  groupFields: z.array(fieldName),
  itemsKey: fieldName,
});

export const ExtractionRuleSchema = z.discriminatedUnion("kind", [ListRuleSchema, GroupsRuleSchema]);

export const EmbeddedFieldSchema = z.object({
  field: fieldName,
  rule: ExtractionRuleSchema.optional(),
});

const FlagCountSchema = z.object({
  field: fieldName,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

export const StatsDimensionsSchema = z.object({
  categoryField: fieldName.optional(),
  venueField: fieldName.optional(),
  regionField: fieldName.optional(),
  price: z.object({ collection: fieldName, field: fieldName }).optional(),
  periodField: fieldName.optional(),
  startDateField: fieldName.optional(),
  endDateField: fieldName.optional(),
  dateSentinels: z.array(z.string()).default([]),
  /** Label → records whose `field` equals `value`, e.g. a "Y" sales flag. */
  flags: z.record(fieldName, FlagCountSchema).optional(),
});

/**
 * A catalog platform: where its records live in the batch document, which fields
 * carry string-encoded documents, and which fields feed the statistics.
 */
export const CatalogSourceSchema = z
  .object({
    id: fieldName,
    name: fieldName,
    description: z.string().optional(),
    listKey: fieldName,
    embeddedFields: z.array(EmbeddedFieldSchema),
    dimensions: StatsDimensionsSchema,
  })
  .superRefine((source, ctx) => {
    const embedded = new Set(source.embeddedFields.map((f) => f.field));
    const targets = new Set<string>();
    source.embeddedFields.forEach((f, i) => {
      if (!f.rule) return;
      const target = f.rule.target;
      if (embedded.has(target)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["embeddedFields", i, "rule", "target"],
          message: `Derived field "${target}" would overwrite an embedded field`,
        });
      }
      if (targets.has(target)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["embeddedFields", i, "rule", "target"],
          message: `Derived field "${target}" is produced by more than one rule`,
        });
      }
      targets.add(target);
    });
    if (embedded.size !== source.embeddedFields.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["embeddedFields"],
        message: "Embedded field names must be unique",
      });
    }
  });

export type ExtractionRule = z.infer<typeof ExtractionRuleSchema>;
export type EmbeddedField = z.infer<typeof EmbeddedFieldSchema>;
export type StatsDimensions = z.infer<typeof StatsDimensionsSchema>;
export type CatalogSource = z.infer<typeof CatalogSourceSchema>;
/** Source definition as written by hand; defaults are filled in by `defineSource`. */
export type CatalogSourceInput = z.input<typeof CatalogSourceSchema>;

/** Validate a source definition, throwing one readable message per problem. */
export function defineSource(input: CatalogSourceInput): CatalogSource {
  const result = CatalogSourceSchema.safeParse(input);
  if (result.success) return result.data;
  const problems = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  throw new Error(`Invalid catalog source "${input.id}": ${problems.join("; ")}`);
}
