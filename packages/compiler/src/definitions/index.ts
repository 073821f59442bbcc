export {
  BASE_SCALAR_ALIASES,
  buildDefinitions,
  buildEnumeration,
  buildStructure,
  buildAlias,
  indexStructures,
} from "./build.js";
