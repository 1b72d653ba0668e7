export {
  normalizeRoute,
  joinRoute,
  routeParamNames,
  matchRoute,
  toExpressPath,
  MalformedPathError,
} from "./path";
export { toCamelCase, simplePlural, toEnvSegment } from "./naming";
