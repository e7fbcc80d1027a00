/*
Purpose: error taxonomy for schema extraction, generation, validation, and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ResourceNotFoundError({ resourceType, providerSource });
       throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export type PipelineStage =
  | "extract"
  | "docs"
  | "compose"
  | "generate"
  | "sanitize"
  | "validate"
  | "write";

export type ArtifactKind = "inputs" | "body" | "outputs";

export class ModuleGenError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ModuleGenError";
  }
}

export class ConfigError extends ModuleGenError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SchemaDocumentError extends ModuleGenError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SchemaDocumentError";
  }
}

export class SchemaAcquisitionError extends ModuleGenError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SchemaAcquisitionError";
  }
}

export class EncodingError extends ModuleGenError {
  public readonly resourceType?: string;
  public readonly artifacts: ArtifactKind[];

  constructor(
    message: string,
    opts: { resourceType?: string; artifacts?: ArtifactKind[]; cause?: unknown } = {},
  ) {
    super(message, opts.cause);
    this.name = "EncodingError";
    this.resourceType = opts.resourceType;
    this.artifacts = opts.artifacts ?? [];
  }
}

// =============================================================================
// RESOURCE-SCOPED ERRORS
// =============================================================================

export class ResourceRunError extends ModuleGenError {
  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly stage: PipelineStage,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ResourceRunError";
  }
}

export class ResourceNotFoundError extends ResourceRunError {
  public readonly providerSource: string;

  constructor(args: { resourceType: string; providerSource: string }) {
    super(
      `Resource type "${args.resourceType}" not found in schema for provider ${args.providerSource}.`,
      args.resourceType,
      "extract",
    );
    this.name = "ResourceNotFoundError";
    this.providerSource = args.providerSource;
  }
}

export type ArtifactFailure = {
  kind: ArtifactKind;
  message: string;
  cause?: unknown;
};

export class GenerationBackendError extends ResourceRunError {
  public readonly failures: ArtifactFailure[];

  constructor(args: { resourceType: string; failures: ArtifactFailure[] }) {
    const kinds = args.failures.map((failure) => failure.kind).join(", ");
    super(
      `Generation failed for ${args.resourceType} (${kinds}).`,
      args.resourceType,
      "generate",
      args.failures[0]?.cause,
    );
    this.name = "GenerationBackendError";
    this.failures = args.failures;
  }
}

export class NamingMismatchError extends ResourceRunError {
  public readonly bodyToken: string | null;
  public readonly outputsToken: string | null;

  constructor(args: {
    resourceType: string;
    message: string;
    bodyToken: string | null;
    outputsToken: string | null;
  }) {
    super(args.message, args.resourceType, "validate");
    this.name = "NamingMismatchError";
    this.bodyToken = args.bodyToken;
    this.outputsToken = args.outputsToken;
  }
}

export class StructuralError extends ResourceRunError {
  public readonly artifact: ArtifactKind;

  constructor(args: { resourceType: string; artifact: ArtifactKind; message: string }) {
    super(args.message, args.resourceType, "validate");
    this.name = "StructuralError";
    this.artifact = args.artifact;
  }
}

export class PipelineStageError extends ResourceRunError {
  constructor(args: { resourceType: string; stage: PipelineStage; cause: unknown }) {
    const detail = args.cause instanceof Error ? args.cause.message : String(args.cause);
    super(
      `Stage "${args.stage}" failed for ${args.resourceType}: ${detail}`,
      args.resourceType,
      args.stage,
      args.cause,
    );
    this.name = "PipelineStageError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  schema: "SCHEMA_ERROR",
  generation: "GENERATION_ERROR",
  validation: "VALIDATION_ERROR",
  io: "IO_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
