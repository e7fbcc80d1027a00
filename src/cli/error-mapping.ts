import {
  ConfigError,
  EncodingError,
  GenerationBackendError,
  NamingMismatchError,
  PipelineStageError,
  ResourceNotFoundError,
  SchemaAcquisitionError,
  SchemaDocumentError,
  StructuralError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type ResourceRunError,
} from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { LlmError } from "../llm/client.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ResourceNotFoundError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.schema,
      title: resourceTitle(error, "resource type not in schema"),
      message: error.message,
      hint: "Check the resource type spelling and the provider version the schema was exported for.",
      cause: error,
    });
  }

  if (error instanceof GenerationBackendError) {
    const details = error.failures.map((failure) => `- ${failure.kind}: ${failure.message}`);
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.generation,
      title: resourceTitle(error, "generation backend failed"),
      message: [error.message, ...details].join("\n"),
      hint: "Raw output of the artifacts that did complete is in the run log.",
      next: "Re-run generate for this resource type.",
      cause: error,
    });
  }

  if (error instanceof NamingMismatchError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: resourceTitle(error, "resource label mismatch"),
      message: error.message,
      hint: "No files were written. Re-run generate to get a consistent set of artifacts.",
      cause: error,
    });
  }

  if (error instanceof StructuralError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: resourceTitle(error, `invalid ${error.artifact} artifact`),
      message: error.message,
      hint: "No files were written. Re-run generate to get a consistent set of artifacts.",
      cause: error,
    });
  }

  if (error instanceof PipelineStageError) {
    return new UserFacingError({
      code: codeForCause(error.cause),
      title: resourceTitle(error, "stage failed"),
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof EncodingError) {
    const subject = error.resourceType
      ? `${error.resourceType} (stage sanitize): generated text rejected`
      : "Generated text rejected";
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.generation,
      title: `${subject}.`,
      message: error.message,
      hint: "The backend returned binary or control characters. Re-run generate.",
      cause: error,
    });
  }

  if (error instanceof SchemaDocumentError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.schema,
      title: "Provider schema unusable.",
      message: error.message,
      hint: "Export the schema again with `modgen schema <supplier> <name> <version>`.",
      cause: error,
    });
  }

  if (error instanceof SchemaAcquisitionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.schema,
      title: "Schema export failed.",
      message: error.message,
      hint: "Check that terraform is installed and the provider version exists in the registry.",
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error.",
      message: error.message,
      hint: "Check the --config path or your modgen.yaml.",
      cause: error,
    });
  }

  if (error instanceof LlmError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.generation,
      title: "LLM request failed.",
      message: error.message,
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Command failed.",
    message: formatErrorMessage(error),
    hint: "Rerun with --debug for more detail.",
    cause: error,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function resourceTitle(error: ResourceRunError, summary: string): string {
  return `${error.resourceType} (stage ${error.stage}): ${summary}.`;
}

function codeForCause(cause: unknown): UserFacingError["code"] {
  if (cause instanceof SchemaDocumentError) return USER_FACING_ERROR_CODES.schema;
  if (cause instanceof LlmError) return USER_FACING_ERROR_CODES.generation;
  if (cause instanceof UserFacingError) return cause.code;
  return USER_FACING_ERROR_CODES.io;
}
