export {
  safeParseYaml,
  safeParseJson,
  formatFriendlyError,
  formatZodIssues,
  type FriendlyError,
  type ParseErrorType,
  type ParseResult,
} from "./friendly-errors";
