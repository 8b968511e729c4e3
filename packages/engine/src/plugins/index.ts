/**
 * @fileoverview Property loader barrel exports
 *
 * @module @bpstats/engine/plugins
 */

export {
    PropertyLoader,
    createPropertyFromYaml,
    isYamlPropertyDefinition,
    type YamlPropertyDefinition,
    type YamlPropertyType,
    type PropertyLoaderConfig,
    type PropertyLoaderLogger,
} from "./PropertyLoader.js";
