import type { LockInfo } from "./types.js";

export type ValidationError =
  | {
      readonly code: "INVALID_DECLARATION";
      readonly address: string;
      readonly message: string;
    }
  | {
      readonly code: "INVALID_EXPRESSION";
      readonly address: string;
      readonly attributePath: string;
      readonly message: string;
    }
  | {
      readonly code: "DUPLICATE_ADDRESS";
      readonly address: string;
      readonly message: string;
    }
  | {
      readonly code: "UNRESOLVED_REFERENCE";
      readonly address: string;
      readonly attributePath: string;
      readonly target: string;
      readonly message: string;
    }
  | {
      readonly code: "CIRCULAR_DEPENDENCY";
      readonly cycle: readonly string[];
      readonly message: string;
    }
  | {
      readonly code: "DANGLING_REFERENCE";
      readonly address: string;
      readonly attributePath: string;
      readonly target: string;
      readonly message: string;
    }
  | {
      readonly code: "PREVENT_DESTROY";
      readonly address: string;
      readonly message: string;
    };

export type ValidationErrorCode = ValidationError["code"];

export type ProviderErrorKind = "transient" | "fatal" | "not_found";

export type ProviderError = {
  readonly kind: ProviderErrorKind;
  readonly message: string;
};

export type StateError =
  | { readonly kind: "state_conflict"; readonly message: string; readonly lock?: LockInfo }
  | { readonly kind: "io"; readonly message: string; readonly path: string }
  | { readonly kind: "decode"; readonly message: string; readonly path: string };

export type RefreshError = {
  readonly kind: "refresh";
  readonly address: string;
  readonly message: string;
};

export type EngineError =
  | { readonly kind: "validation"; readonly errors: readonly ValidationError[] }
  | RefreshError
  | StateError;

export const transientError = (message: string): ProviderError => ({
  kind: "transient",
  message,
});

export const fatalError = (message: string): ProviderError => ({ kind: "fatal", message });

export const notFoundError = (message: string): ProviderError => ({
  kind: "not_found",
  message,
});

export const formatValidationError = (error: ValidationError): string => {
  switch (error.code) {
    case "CIRCULAR_DEPENDENCY":
      return error.message;
    case "INVALID_EXPRESSION":
    case "UNRESOLVED_REFERENCE":
    case "DANGLING_REFERENCE":
      return `${error.address} (${error.attributePath}): ${error.message}`;
    case "INVALID_DECLARATION":
    case "DUPLICATE_ADDRESS":
    case "PREVENT_DESTROY":
      return `${error.address}: ${error.message}`;
  }
};

export const formatEngineError = (error: EngineError): string => {
  switch (error.kind) {
    case "validation":
      return error.errors.map(formatValidationError).join("\n");
    case "state_conflict":
      return error.lock === undefined
        ? error.message
        : `${error.message} (lock ${error.lock.id} held by ${error.lock.who} for ${error.lock.operation})`;
    case "refresh":
      return `Refreshing ${error.address} failed: ${error.message}`;
    case "io":
    case "decode":
      return `${error.path}: ${error.message}`;
  }
};
