/**
 * @fileoverview Short description
 *
 * Assembles the description the game shows when an object is looked at:
 * the blueprint's own text followed by the rules lines the game generates
 * from its parts. Color markup is kept.
 *
 * Rules are added in the order the game lists them:
 * 1. Item rules: reputation, missile weapon stats, resistances and
 *    attribute bonuses, carry capacity, shields, compute power, light,
 *    per-item rules, saving throws
 * 2. Robot hum (appended to the description itself)
 * 3. Gas repulsion, genotype texts, cybernetics
 * 4. Rules descriptions, energy cost reduction, marks and postfixes
 *
 * Telepathy always comes first.
 *
 * @module domain/catalog/description
 */

import {
    boolOrDefault,
    hasText,
    intOrDefault,
    intOrUndefined,
    type BlueprintView,
    type PropertyValue,
} from "@bpstats/engine";
import { isRoboticized } from "../attributes/classification.js";
import { lookup } from "../tables.js";
import { makeListFromWords, signed, titleCase } from "../utils/index.js";
import { agility, ego, intelligence, strength, toughness, willpower } from "./attributes.js";
import type { CatalogContext, CatalogFunction } from "./CatalogContext.js";
import { acid, cold, electrical, heat, quickness } from "./defense.js";
import { movespeedbonus, reputationEntries } from "./items.js";

const kRULES_OPEN = "{{rules|";
const kRULES_CLOSE = "}}";
const kALL_FACTIONS = "*allvisiblefactions";
const kROBOT_HUM = "There is a low, persistent hum emanating outward.";

function rules(text: string): string {
    return `${kRULES_OPEN}${text}${kRULES_CLOSE}`;
}

interface DescribedAttribute {
    readonly name: string;
    readonly label: string;
    readonly read: CatalogFunction;
    readonly positiveColor: string;
    readonly negativeColor: string;
    readonly resistance: boolean;
}

const kDESCRIBED_ATTRIBUTES: readonly DescribedAttribute[] = [
    { name: "heat",           label: "heat",         read: heat,           positiveColor: "R", negativeColor: "R", resistance: true },
    { name: "cold",           label: "cold",         read: cold,           positiveColor: "C", negativeColor: "C", resistance: true },
    { name: "electrical",     label: "electrical",   read: electrical,     positiveColor: "W", negativeColor: "W", resistance: true },
    { name: "acid",           label: "acid",         read: acid,           positiveColor: "G", negativeColor: "G", resistance: true },
    { name: "willpower",      label: "willpower",    read: willpower,      positiveColor: "C", negativeColor: "R", resistance: false },
    { name: "ego",            label: "ego",          read: ego,            positiveColor: "C", negativeColor: "R", resistance: false },
    { name: "agility",        label: "agility",      read: agility,        positiveColor: "C", negativeColor: "R", resistance: false },
    { name: "toughness",      label: "toughness",    read: toughness,      positiveColor: "C", negativeColor: "R", resistance: false },
    { name: "strength",       label: "strength",     read: strength,       positiveColor: "C", negativeColor: "R", resistance: false },
    { name: "intelligence",   label: "intelligence", read: intelligence,   positiveColor: "C", negativeColor: "R", resistance: false },
    { name: "quickness",      label: "quickness",    read: quickness,      positiveColor: "C", negativeColor: "R", resistance: false },
    { name: "movespeedbonus", label: "move speed",   read: movespeedbonus, positiveColor: "C", negativeColor: "R", resistance: false },
];

function reputationRules(subject: BlueprintView, context: CatalogContext): string[] {
    return reputationEntries(subject, context.logger).map(([faction, amount]) => {
        const target = faction === kALL_FACTIONS
            ? "every faction"
            : lookup(context.tables.factionNames, faction) ?? faction;
        return rules(`${signed(amount)} reputation with ${target}`);
    });
}

function accuracyText(accuracy: number): string {
    if (accuracy <= 0) {
        return "Very High";
    }
    if (accuracy < 5) {
        return "High";
    }
    if (accuracy < 10) {
        return "Medium";
    }
    return accuracy < 25 ? "Low" : "Very Low";
}

function missileWeaponRules(subject: BlueprintView): string | undefined {
    if (!subject.hasPart("MissileWeapon")) {
        return undefined;
    }

    let skill = subject.part("MissileWeapon", "Skill") ?? "Rifle";
    if (skill === "Rifle") {
        skill = "Bows & Rifles";
    }
    else if (skill === "HeavyWeapons") {
        skill = "Heavy Weapon";
    }

    const lines = [
        `Weapon Class: ${skill}`,
        `Accuracy: ${accuracyText(intOrDefault(subject.part("MissileWeapon", "WeaponAccuracy"), 0))}`,
    ];

    const ammoPerShot = intOrDefault(subject.part("MissileWeapon", "AmmoPerAction"), 1);
    if (ammoPerShot > 1) {
        lines.push(`Multiple ammo used per shot: ${ammoPerShot}`);
    }
    const projectiles = intOrDefault(subject.part("MissileWeapon", "ShotsPerAction"), 1);
    if (boolOrDefault(subject.part("MissileWeapon", "bShowShotsPerAction"), true) && projectiles > 1) {
        lines.push(`Multiple projectiles per shot: ${projectiles}`);
    }
    if (boolOrDefault(subject.part("MissileWeapon", "NoWildfire"), false)) {
        lines.push("Spray fire: This item can be fired while adjacent to multiple enemies without risk of the shot going wild.");
    }
    if (skill === "Heavy Weapon") {
        lines.push("-25 move speed");
    }
    const penetrationStat = subject.part("MissileWeapon", "ProjectilePenetrationStat");
    if (hasText(penetrationStat)) {
        lines.push(`Projectiles fired with this weapon receive bonus penetration based on the wielder's ${penetrationStat}.`);
    }

    return rules(lines.join("\n"));
}

function isShown(value: PropertyValue | undefined): value is string | number {
    return (typeof value === "string" && value !== "") || (typeof value === "number" && value !== 0);
}

/**
 * Colored resistance and attribute lines, one entry for the whole group.
 */
function attributeRules(subject: BlueprintView, context: CatalogContext): string | undefined {
    const hidden = lookup(context.tables.descriptionHiddenAttributes, subject.name) ?? [];
    const overrides = lookup(context.tables.descriptionAttributeOverrides, subject.name) ?? {};

    const lines: string[] = [];
    for (const attribute of kDESCRIBED_ATTRIBUTES) {
        const value = attribute.read(subject, context);
        if (!isShown(value) || hidden.includes(attribute.name)) {
            continue;
        }

        const amount = signed(lookup(overrides, attribute.name) ?? value);
        const color = amount.startsWith("-") ? attribute.negativeColor : attribute.positiveColor;
        const suffix = attribute.resistance ? " Resistance" : "";
        lines.push(`{{${color}|${amount} ${titleCase(attribute.label)}${suffix}}}`);
    }
    return lines.length > 0 ? lines.join("\n") : undefined;
}

function equipmentRules(subject: BlueprintView): string[] {
    const extras: string[] = [];

    const carryBonus = intOrUndefined(subject.part("Armor", "CarryBonus"));
    if (carryBonus) {
        extras.push(rules(`${signed(carryBonus)}% carry capacity`));
    }

    if (subject.hasPart("Shield")) {
        extras.push(rules("Shields only grant their AV when you successfully block an attack."));
    }

    if (subject.part("ComputeNode", "WorksOnEquipper") === "true") {
        const power = subject.part("ComputeNode", "Power") ?? "20";
        extras.push(rules(`When equipped and powered, provides ${power} units of compute power to the local lattice.`));
    }

    const showLight = subject.part("ActiveLightSource", "ShowInShortDescription");
    if (
        subject.part("ActiveLightSource", "WorksOnEquipper") === "true" &&
        (showLight === undefined || showLight === "true")
    ) {
        const radius = subject.part("ActiveLightSource", "Radius") ?? "5";
        extras.push(rules(`When equipped, provides light in radius ${radius}.`));
    }

    return extras;
}

function saveModifierRule(subject: BlueprintView): string | undefined {
    if (!subject.hasPart("SaveModifier")) {
        return undefined;
    }
    const shown = subject.part("SaveModifier", "ShowInShortDescription");
    if (shown !== undefined && shown !== "true") {
        return undefined;
    }

    let text = `${subject.part("SaveModifier", "Amount") ?? "1"} on saves`;
    const against = subject.part("SaveModifier", "Vs");
    if (hasText(against)) {
        text += ` vs. ${makeListFromWords(against.split(","))}`;
    }
    return rules(`${text}.`);
}

function itemRules(subject: BlueprintView, context: CatalogContext): string[] {
    const extras = reputationRules(subject, context);

    const missile = missileWeaponRules(subject);
    if (missile) {
        extras.push(missile);
    }
    const attributes = attributeRules(subject, context);
    if (attributes) {
        extras.push(attributes);
    }
    extras.push(...equipmentRules(subject));
    extras.push(...(lookup(context.tables.descriptionRules, subject.name) ?? []));

    const save = saveModifierRule(subject);
    if (save) {
        extras.push(save);
    }
    return extras;
}

function gasRepulsionRule(subject: BlueprintView, context: CatalogContext, isItem: boolean): string | undefined {
    if (!subject.hasPart("PartsGas")) {
        return undefined;
    }

    const chance = subject.part("PartsGas", "Chance");
    let text = chance !== undefined
        ? `${chance}% chance per turn to repel gases near its`
        : "Repels gases near its";

    if (!isItem) {
        text += "elf.";
    }
    else {
        text += context.tables.wielderGasRepellers.includes(subject.name) ? " wielder or wearer." : " user.";
    }
    return rules(text);
}

function genotypeDescriptions(subject: BlueprintView): string[] {
    if (!subject.intProperty("GenotypeBasedDescription")) {
        return [];
    }
    return [
        `[True kin]\n${subject.property("TrueManDescription") ?? ""}`,
        `[Mutant]\n${subject.property("MutantDescription") ?? ""}`,
    ];
}

/**
 * Cybernetics rules block: a fixed infix, behavior descriptions, then
 * implant slots and license cost.
 */
function cyberneticsRules(subject: BlueprintView, context: CatalogContext, hasOtherRules: boolean): string | undefined {
    let body = "";

    const infix = Object.keys(context.tables.cyberneticsInfixes)
        .find((part) => subject.specified("part", part));
    if (infix !== undefined) {
        body += `${context.tables.cyberneticsInfixes[infix]}\n\n`;
    }

    for (const part of context.tables.behaviorDescriptionParts) {
        if (!subject.specified("part", part)) {
            continue;
        }
        const behavior = subject.part(part, "BehaviorDescription");
        if (hasText(behavior)) {
            body += behavior;
        }
    }

    const slots = subject.part("Cybernetics2BaseItem", "Slots");
    if (slots !== undefined) {
        if (hasOtherRules || body.length > 0) {
            body += "\n\n";
        }

        const lines: string[] = [];
        if (subject.hasTag("CyberneticsDestroyOnRemoval")) {
            lines.push("Destroyed when uninstalled.");
        }
        lines.push(`Target body parts: ${slots.replaceAll(",", ", ")}`);
        lines.push(`License points: ${subject.part("Cybernetics2BaseItem", "Cost") ?? ""}`);
        lines.push("Only compatible with True Kin genotypes");

        const postfix = Object.keys(context.tables.cyberneticsPostfixes)
            .find((part) => subject.specified("part", part));
        if (postfix !== undefined) {
            lines.push(context.tables.cyberneticsPostfixes[postfix]);
        }

        body += lines.join("\n");
    }

    return body.length > 0 ? rules(body) : undefined;
}

function rulesDescriptions(subject: BlueprintView): string[] {
    if (!subject.hasPart("RulesDescription")) {
        return [];
    }

    const text = subject.part("RulesDescription", "Text");
    if (subject.part("RulesDescription", "AltForGenotype") === "True Kin") {
        return [
            `[Mutant]\n${rules(text ?? "")}`,
            `[True Kin]\n${rules(subject.part("RulesDescription", "GenotypeAlt") ?? "")}`,
        ];
    }
    return [rules(text ?? "")];
}

function energyCostRule(subject: BlueprintView): string | undefined {
    if (!subject.hasPart("ReduceEnergyCosts")) {
        return undefined;
    }
    const generate = subject.part("ReduceEnergyCosts", "GenerateShortDescription");
    if (generate !== undefined && generate !== "true") {
        return undefined;
    }

    const reduction = intOrUndefined(subject.part("ReduceEnergyCosts", "PercentageReduction"));
    if (reduction === undefined) {
        return undefined;
    }

    const powered = intOrDefault(subject.part("ReduceEnergyCosts", "ChargeUse"), 0) !== 0;
    const scope = subject.part("ReduceEnergyCosts", "ScopeDescription") ?? "";
    const text = `${powered ? "when powered, " : ""}provides ${reduction}% reduction in ${scope}.`;
    return rules(text.charAt(0).toUpperCase() + text.slice(1));
}

/**
 * Short description with generated rules text, keeping color markup.
 */
export function desc(subject: BlueprintView, context: CatalogContext): string | undefined {
    const short = subject.part("Description", "Short");
    if (!short || context.tables.hiddenDescriptions.includes(short)) {
        return undefined;
    }

    let description = short;
    const isItem = subject.inheritsFrom("Item");
    const extras = isItem ? itemRules(subject, context) : [];

    if (isRoboticized(subject)) {
        const postfix = subject.part("Roboticized", "DescriptionPostfix");
        description += ` ${hasText(postfix) ? postfix : kROBOT_HUM}`;
    }

    const gas = gasRepulsionRule(subject, context, isItem);
    if (gas) {
        extras.push(gas);
    }
    extras.push(...genotypeDescriptions(subject));

    const cybernetics = cyberneticsRules(subject, context, extras.length > 0);
    if (cybernetics) {
        extras.push(cybernetics);
    }
    extras.push(...rulesDescriptions(subject));

    if (subject.hasPart("AddsTelepathyOnEquip")) {
        extras.unshift(rules("Grants you Telepathy."));
    }

    const energy = energyCostRule(subject);
    if (energy) {
        extras.push(energy);
    }

    const mark = subject.part("Description", "Mark");
    if (hasText(mark)) {
        extras.push(mark);
    }
    if (subject.hasPart("BonusPostfix")) {
        extras.push(subject.part("BonusPostfix", "Postfix") ?? "");
    }

    if (extras.length > 0) {
        description += `\n\n${extras.join("\n")}`;
    }
    return description.replaceAll("\r\n", "\n").replaceAll("~J211", "");
}

