export { orderDefinitions, definitionDependencies, forwardReferences, type OrderDeviation, type OrderResult } from "./order-definitions.js";
