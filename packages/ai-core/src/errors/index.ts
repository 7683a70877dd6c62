export {
  type AdvisorErrorCode,
  type AdvisorErrorKind,
  type AdvisorErrorOptions,
  type AdvisorErrorResponse,
  type AdvisorWarning,
  type Collaborator,
  type CollaboratorErrorCode,
  type ConfigurationErrorCode,
  AdvisorError,
  CollaboratorError,
  ConfigurationError,
  errorMessage,
  isAdvisorError,
  isCollaboratorError,
  isConfigurationError,
  toAdvisorError,
} from "./errors";
