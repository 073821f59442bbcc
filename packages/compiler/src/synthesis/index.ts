export {
  synthesizeDefault,
  MissingValue,
  type DefaultValue,
  type DefaultObject,
  type SynthesizeDefaultOptions,
} from "./default-value.js";
