/**
 * PromptPack schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PACK LAYOUT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   PromptPack
 *   ├── template_engine      { version, syntax, features? }
 *   ├── prompts              name → Prompt            (at least one)
 *   │   ├── variables        ordered Variable declarations
 *   │   ├── tools            names, resolved against PromptPack.tools
 *   │   ├── tool_policy      tool_choice, round/call limits, blocklist
 *   │   ├── validators       output guardrails
 *   │   ├── model_overrides  model → template/parameter overrides
 *   │   └── media            multimodal configuration
 *   ├── fragments            name → template body
 *   ├── tools                name → Tool
 *   ├── metadata             open record
 *   └── compilation          provenance
 *
 * Keys keep the pack file's snake_case so a parsed pack serializes back to
 * the same document. Every object is closed (unknown keys are rejected)
 * except `metadata`, `media` (extra keys are custom media types), custom
 * media type configs, and tool `parameters` (JSON Schema keywords).
 */

import { z } from "zod";
import { JsonObjectSchema, JsonValueSchema } from "./json.js";

// ---------------------------------------------------------------------------
// Shared patterns
// ---------------------------------------------------------------------------

/** Semantic version with an optional leading "v". */
export const SEMVER_PATTERN =
  /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;

/** Variable and tool names. */
export const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const SemVer = z.string().regex(SEMVER_PATTERN, "Must be a semantic version (e.g. 1.0.0)");

function isCompilableRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

export const VariableType = z.enum(["string", "number", "boolean", "object", "array"]);
export type VariableType = z.infer<typeof VariableType>;

export const VariableValidationSchema = z
  .object({
    /** Regex anchored at the start of string values. */
    pattern: z
      .string()
      .refine(isCompilableRegex, "Pattern is not a valid regular expression")
      .optional(),
    min_length: z.number().int().min(0).optional(),
    max_length: z.number().int().min(1).optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    enum: z.array(JsonValueSchema).optional(),
  })
  .strict();
export type VariableValidation = z.infer<typeof VariableValidationSchema>;

export const VariableSchema = z
  .object({
    name: z.string().regex(IDENTIFIER_PATTERN, "Variable name must be an identifier"),
    type: VariableType,
    required: z.boolean(),
    /** Returned when the value is absent, even for required variables. */
    default: JsonValueSchema.optional(),
    description: z.string().optional(),
    example: JsonValueSchema.optional(),
    validation: VariableValidationSchema.optional(),
  })
  .strict();
export type Variable = z.infer<typeof VariableSchema>;

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export const ToolParametersSchema = z
  .object({
    type: z.literal("object").default("object"),
    properties: z.record(z.string(), JsonValueSchema).default({}),
    required: z.array(z.string()).optional(),
  })
  .passthrough();
export type ToolParameters = z.infer<typeof ToolParametersSchema>;

/** A function-calling tool definition. */
export const ToolSchema = z
  .object({
    name: z.string().regex(IDENTIFIER_PATTERN, "Tool name must be an identifier"),
    description: z.string().min(1),
    parameters: ToolParametersSchema.optional(),
  })
  .strict();
export type Tool = z.infer<typeof ToolSchema>;

export const ToolChoice = z.enum(["auto", "required", "none"]);
export type ToolChoice = z.infer<typeof ToolChoice>;

export const ToolPolicySchema = z
  .object({
    tool_choice: ToolChoice.default("auto"),
    max_rounds: z.number().int().min(1).default(5),
    max_tool_calls_per_turn: z.number().int().min(1).default(10),
    /** Tool names the prompt may never expose, even if listed in `tools`. */
    blocklist: z.array(z.string()).optional(),
  })
  .strict();
export type ToolPolicy = z.infer<typeof ToolPolicySchema>;

// ---------------------------------------------------------------------------
// Pipeline & generation parameters
// ---------------------------------------------------------------------------

export const MiddlewareConfigSchema = z
  .object({
    type: z.string(),
    config: JsonObjectSchema.optional(),
  })
  .strict();
export type MiddlewareConfig = z.infer<typeof MiddlewareConfigSchema>;

export const PipelineConfigSchema = z
  .object({
    stages: z.array(z.string()),
    middleware: z.array(MiddlewareConfigSchema).optional(),
  })
  .strict();
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Sampling knobs. Every field is optional and independently overridable. */
export const ParametersSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().min(1).optional(),
    top_p: z.number().min(0).max(1).optional(),
    top_k: z.number().int().min(1).optional(),
    frequency_penalty: z.number().min(-2).max(2).optional(),
    presence_penalty: z.number().min(-2).max(2).optional(),
  })
  .strict();
export type Parameters = z.infer<typeof ParametersSchema>;

// ---------------------------------------------------------------------------
// Validators (guardrails)
// ---------------------------------------------------------------------------

export const ValidatorType = z.enum([
  "banned_words",
  "max_length",
  "min_length",
  "regex_match",
  "json_schema", // reserved
  "sentiment", // reserved
  "toxicity", // reserved
  "pii_detection", // reserved
  "custom", // reserved
]);
export type ValidatorType = z.infer<typeof ValidatorType>;

export const ValidatorSchema = z
  .object({
    type: ValidatorType,
    enabled: z.boolean(),
    /** Violations from a blocking validator flip `isValid` to false. */
    fail_on_violation: z.boolean().default(false),
    params: JsonObjectSchema.optional(),
  })
  .strict();
export type Validator = z.infer<typeof ValidatorSchema>;

export const TestedModelSchema = z
  .object({
    provider: z.string(),
    model: z.string(),
    date: z.string(),
    success_rate: z.number().min(0).max(1).optional(),
    avg_tokens: z.number().min(0).optional(),
    avg_cost: z.number().min(0).optional(),
    avg_latency_ms: z.number().min(0).optional(),
    notes: z.string().optional(),
  })
  .strict();
export type TestedModel = z.infer<typeof TestedModelSchema>;

/**
 * Model-specific modifications. `system_template` replaces the base template
 * outright; otherwise prefix and suffix wrap it.
 */
export const ModelOverrideSchema = z
  .object({
    system_template_prefix: z.string().optional(),
    system_template_suffix: z.string().optional(),
    system_template: z.string().optional(),
    parameters: ParametersSchema.optional(),
  })
  .strict();
export type ModelOverride = z.infer<typeof ModelOverrideSchema>;

// ---------------------------------------------------------------------------
// Multimodal
// ---------------------------------------------------------------------------

export const DetailLevel = z.enum(["low", "high", "auto"]);
export type DetailLevel = z.infer<typeof DetailLevel>;

export const ImageConfigSchema = z
  .object({
    max_size_mb: z.number().int().min(1).optional(),
    allowed_formats: z.array(z.enum(["jpeg", "jpg", "png", "webp", "gif", "bmp"])).optional(),
    default_detail: DetailLevel.default("auto"),
    require_caption: z.boolean().default(false),
    max_images_per_msg: z.number().int().min(1).optional(),
  })
  .strict();

export const AudioConfigSchema = z
  .object({
    max_size_mb: z.number().int().min(1).optional(),
    allowed_formats: z.array(z.enum(["mp3", "wav", "opus", "flac", "m4a", "aac"])).optional(),
    max_duration_sec: z.number().int().min(1).optional(),
    require_metadata: z.boolean().default(false),
  })
  .strict();

export const VideoConfigSchema = z
  .object({
    max_size_mb: z.number().int().min(1).optional(),
    allowed_formats: z.array(z.enum(["mp4", "webm", "mov", "avi", "mkv"])).optional(),
    max_duration_sec: z.number().int().min(1).optional(),
    require_metadata: z.boolean().default(false),
  })
  .strict();

export const DocumentConfigSchema = z
  .object({
    max_size_mb: z.number().int().min(1).optional(),
    allowed_formats: z.array(z.string()).optional(),
    max_pages: z.number().int().min(1).optional(),
    require_metadata: z.boolean().default(false),
    extraction_mode: z.enum(["text", "structured", "raw"]).default("text"),
  })
  .strict();

/** Configuration for a custom media type; open for forward compatibility. */
export const GenericMediaTypeConfigSchema = z
  .object({
    max_size_mb: z.number().int().min(1).optional(),
    allowed_formats: z.array(z.string()).optional(),
    require_metadata: z.boolean().default(false),
    validation_params: JsonObjectSchema.optional(),
  })
  .passthrough();
export type GenericMediaTypeConfig = z.infer<typeof GenericMediaTypeConfigSchema>;

export const MediaReferenceSchema = z
  .object({
    file_path: z.string().optional(),
    url: z.string().optional(),
    base64: z.string().optional(),
    mime_type: z.string(),
    detail: DetailLevel.optional(),
    caption: z.string().optional(),
  })
  .strict();
export type MediaReference = z.infer<typeof MediaReferenceSchema>;

export const ContentPartSchema = z
  .object({
    /** text, image, audio, video, or a custom lowercase tag */
    type: z.string().regex(/^[a-z0-9_]+$/),
    text: z.string().optional(),
    media: MediaReferenceSchema.optional(),
  })
  .strict();
export type ContentPart = z.infer<typeof ContentPartSchema>;

export const MultimodalExampleSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    role: z.enum(["user", "assistant", "system"]),
    parts: z.array(ContentPartSchema).min(1),
  })
  .strict();
export type MultimodalExample = z.infer<typeof MultimodalExampleSchema>;

/**
 * Unknown keys are kept as-is; a custom media type's body is not coerced
 * to GenericMediaTypeConfig here.
 */
export const MediaConfigSchema = z
  .object({
    enabled: z.boolean(),
    supported_types: z.array(z.string()).optional(),
    image: ImageConfigSchema.optional(),
    audio: AudioConfigSchema.optional(),
    video: VideoConfigSchema.optional(),
    document: DocumentConfigSchema.optional(),
    examples: z.array(MultimodalExampleSchema).optional(),
  })
  .catchall(JsonValueSchema);
export type MediaConfig = z.infer<typeof MediaConfigSchema>;

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

export const PromptSchema = z
  .object({
    id: z
      .string()
      .regex(
        /^[a-z][a-z0-9_-]*$/,
        "Prompt ID must be lowercase alphanumeric with dashes or underscores, starting with a letter"
      ),
    name: z.string().min(1),
    description: z.string().optional(),
    version: SemVer,
    system_template: z.string().min(1),
    variables: z.array(VariableSchema).optional(),
    /** Names in PromptPack.tools; dangling names are ignored at lookup. */
    tools: z.array(z.string()).optional(),
    tool_policy: ToolPolicySchema.optional(),
    pipeline: PipelineConfigSchema.optional(),
    parameters: ParametersSchema.optional(),
    validators: z.array(ValidatorSchema).optional(),
    tested_models: z.array(TestedModelSchema).optional(),
    model_overrides: z.record(z.string(), ModelOverrideSchema).optional(),
    media: MediaConfigSchema.optional(),
  })
  .strict();
export type Prompt = z.infer<typeof PromptSchema>;

// ---------------------------------------------------------------------------
// Pack
// ---------------------------------------------------------------------------

export const TemplateFeature = z.enum([
  "basic_substitution",
  "fragments",
  "conditionals",
  "loops",
  "filters",
]);

export const TemplateEngineConfigSchema = z
  .object({
    version: z.string(),
    syntax: z.string(),
    features: z.array(TemplateFeature).optional(),
  })
  .strict();
export type TemplateEngineConfig = z.infer<typeof TemplateEngineConfigSchema>;

export const CompilationSchema = z
  .object({
    compiled_with: z.string(),
    created_at: z.string(),
    schema: z.string(),
    source: z.string().optional(),
  })
  .strict();

export const CostEstimateSchema = z
  .object({
    min_cost_usd: z.number().min(0).optional(),
    max_cost_usd: z.number().min(0).optional(),
    avg_cost_usd: z.number().min(0).optional(),
  })
  .strict();

export const PackMetadataSchema = z
  .object({
    domain: z.string().optional(),
    language: z.string().regex(/^[a-z]{2}$/, "Language must be a two-letter code").optional(),
    tags: z.array(z.string()).optional(),
    cost_estimate: CostEstimateSchema.optional(),
  })
  .passthrough();
export type PackMetadata = z.infer<typeof PackMetadataSchema>;

export const PromptPackSchema = z
  .object({
    $schema: z.string().optional(),
    id: z
      .string()
      .min(1)
      .max(100)
      .regex(
        /^[a-z][a-z0-9-]*$/,
        "Pack ID must be lowercase alphanumeric with dashes, starting with a letter"
      ),
    name: z.string().min(1).max(200),
    version: SemVer,
    description: z.string().max(5000).optional(),
    template_engine: TemplateEngineConfigSchema,
    prompts: z
      .record(z.string(), PromptSchema)
      .refine((prompts) => Object.keys(prompts).length > 0, "Pack must define at least one prompt"),
    fragments: z.record(z.string(), z.string()).optional(),
    tools: z.record(z.string(), ToolSchema).optional(),
    metadata: PackMetadataSchema.optional(),
    compilation: CompilationSchema.optional(),
  })
  .strict();

export type PromptPack = z.infer<typeof PromptPackSchema>;
