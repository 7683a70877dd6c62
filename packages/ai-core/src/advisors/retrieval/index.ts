export {
  createRetrievalAdvisor,
  DEFAULT_QUERY_REQUIREMENT,
  GROUNDING_INSTRUCTION,
  RetrievalAdvisor,
  type RetrievalAdvisorConfig,
  renderDocuments,
  renderGroundedSystemText,
  renderQueryTransform,
} from "./retrievalAdvisor";
