import { z } from "zod";

const stringList = z.array(z.string()).default([]);

export const entityFieldSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  required: z.boolean().default(true)
});

export const entitySchema = z.object({
  name: z.string().min(1),
  fields: z.array(entityFieldSchema).default([])
});

export const httpMethodSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
  z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"])
);

export const apiEndpointSchema = z.object({
  method: httpMethodSchema,
  path: z.string().min(1),
  description: z.string().default(""),
  requestBodyExample: z.unknown().optional(),
  responseExample: z.unknown().optional()
});

export const acceptanceScenarioSchema = z.object({
  feature: z.string().default(""),
  scenario: z.string().min(1),
  given: stringList,
  when: stringList,
  then: stringList
});

export const techChoiceSchema = z.object({
  language: z.string().min(1).default("python"),
  framework: z.string().min(1).default("fastapi"),
  testFramework: z.string().min(1).default("pytest")
});

export const specificationSchema = z.object({
  title: z.string().trim().min(1),
  summary: z.string().default(""),
  scope: z
    .object({
      in: stringList,
      out: stringList
    })
    .default({}),
  functionalRequirements: stringList,
  nonFunctionalRequirements: stringList,
  entities: z.array(entitySchema).default([]),
  apiEndpoints: z.array(apiEndpointSchema).default([]),
  acceptanceCriteria: z.array(acceptanceScenarioSchema).default([]),
  techChoice: techChoiceSchema.default({})
});

export const generatedFilesSchema = z.object({
  files: z
    .array(
      z.object({
        path: z.string().trim().min(1),
        content: z.string()
      })
    )
    .default([])
});

export type EntityField = z.infer<typeof entityFieldSchema>;
export type Entity = z.infer<typeof entitySchema>;
export type ApiEndpoint = z.infer<typeof apiEndpointSchema>;
export type AcceptanceScenario = z.infer<typeof acceptanceScenarioSchema>;
export type TechChoice = z.infer<typeof techChoiceSchema>;
export type Specification = z.infer<typeof specificationSchema>;
export type GeneratedFilesPayload = z.infer<typeof generatedFilesSchema>;
