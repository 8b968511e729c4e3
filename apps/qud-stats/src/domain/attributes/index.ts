/**
 * @fileoverview Attribute barrel exports
 *
 * @module domain/attributes
 */

export {
    AttributeResolver,
    attributeModifierFor,
    kCORE_ATTRIBUTES,
    levelOf,
    type StatMode,
} from "./AttributeResolver.js";
export {
    characterKind,
    isCharacter,
    isRoboticized,
    mutationLevels,
    rawLevel,
    type CharacterKind,
} from "./classification.js";
