/**
 * URL routing: rules, maps, matching and URL building
 */

export {
  MapAdapter,
  prepareBuildValues,
  type BuildInput,
  type BuildOptions,
  type MapAdapterSettings,
  type MatchOptions,
  type MatchOutcome,
  type MatchedOutcome,
} from "./adapter.js"
export {
  AnyConverter,
  DEFAULT_CONVERTERS,
  FloatConverter,
  IntegerConverter,
  PathConverter,
  StringConverter,
  UuidConverter,
  bindConverterArguments,
  type Converter,
  type ConverterArgument,
  type ConverterContext,
  type ConverterFactory,
  type ConverterKeywords,
} from "./converters.js"
export {
  BadRequestError,
  BuildError,
  DuplicateRuleError,
  HttpRoutingError,
  MethodNotAllowedError,
  NotFoundError,
  RequestRedirectError,
  RoutingError,
  RuleBindingError,
  RuleSyntaxError,
  ValidationError,
  WebsocketMismatchError,
  isHttpRoutingError,
  isRoutingError,
} from "./errors.js"
export {
  EndpointPrefix,
  RuleTemplate,
  RuleTemplateFactory,
  Submount,
  Subdomain,
  type TemplateVariables,
} from "./factories.js"
export {
  INVALID_SUBDOMAIN,
  UrlMap,
  setRoutingLogLevel,
  type BindOptions,
  type RoutingRequest,
  type RoutingSnapshot,
  type UrlMapOptions,
} from "./map.js"
export { getRoutingMetrics, type RoutingMetrics } from "./metrics.js"
export {
  Rule,
  type RedirectCallback,
  type RouteValues,
  type RuleFactory,
  type RuleOptions,
} from "./rule.js"
export {
  encodeHost,
  encodeQuery,
  quote,
  quotePlus,
  type QueryArgs,
  type QuerySortKey,
} from "./urls.js"
