/**
 * @fileoverview Weapon properties
 *
 * Melee, missile and thrown weapon statistics. Missile weapons delegate
 * most of their numbers to the projectile blueprint they fire.
 *
 * @module domain/catalog/weapons
 */

import {
    InconsistentDataError,
    hasText,
    intOrDefault,
    intOrUndefined,
    type BlueprintView,
} from "@bpstats/engine";
import { lookup } from "../tables.js";
import type { CatalogContext } from "./CatalogContext.js";

/**
 * Loader parts that name a projectile, in lookup order.
 */
const kPROJECTILE_LOADERS = [
    "BioAmmoLoader",
    "AmmoArrow",
    "MagazineAmmoLoader",
    "EnergyAmmoLoader",
    "LiquidAmmoLoader",
];

/**
 * The projectile a missile weapon or arrow fires.
 *
 * Bows are not covered: what they fire depends on the arrow loaded.
 *
 * @throws InconsistentDataError if the projectile names an unknown blueprint
 */
export function projectileOf(subject: BlueprintView): BlueprintView | undefined {
    if (!subject.hasPart("MissileWeapon") && !subject.specified("part", "AmmoArrow")) {
        return undefined;
    }

    for (const loader of kPROJECTILE_LOADERS) {
        const name = subject.part(loader, "ProjectileObject");
        if (!hasText(name)) {
            continue;
        }

        const projectile = subject.resolve(name);
        if (!projectile) {
            throw new InconsistentDataError(`Unknown projectile blueprint: ${name}`, name);
        }
        return projectile;
    }
    return undefined;
}

/**
 * One part attribute of the projectile, if there is a projectile.
 */
export function projectilePart(subject: BlueprintView, key: string, attribute: string): string | undefined {
    return projectileOf(subject)?.part(key, attribute);
}

function isMeleeWeapon(subject: BlueprintView): boolean {
    return subject.inheritsFrom("MeleeWeapon") || subject.specified("part", "MeleeWeapon");
}

/**
 * Missile weapon accuracy; 0 when unspecified.
 */
export function accuracy(subject: BlueprintView): number | undefined {
    if (!subject.hasPart("MissileWeapon")) {
        return undefined;
    }
    return intOrDefault(subject.part("MissileWeapon", "WeaponAccuracy"), 0);
}

/**
 * What kind of ammunition the weapon uses.
 */
export function ammo(subject: BlueprintView, context: CatalogContext): string | undefined {
    const ammoPart = subject.part("MagazineAmmoLoader", "AmmoPart");
    if (hasText(ammoPart)) {
        return lookup(context.tables.ammoTypes, ammoPart);
    }

    const chargeUse = subject.part("EnergyAmmoLoader", "ChargeUse");
    if (hasText(chargeUse) && intOrDefault(chargeUse, 0) > 0) {
        if (subject.hasPart("EnergyCellSocket") && subject.part("EnergyCellSocket", "SlotType") === "EnergyCell") {
            return "energy";
        }
        if (subject.hasPart("LiquidFueledPowerPlant")) {
            return subject.part("LiquidFueledPowerPlant", "Liquid");
        }
        return undefined;
    }

    if (subject.hasPart("LiquidAmmoLoader")) {
        return subject.part("LiquidAmmoLoader", "Liquid");
    }
    return undefined;
}

/**
 * Damage types of the projectile, e.g. `["Explosive", "Fire"]`.
 */
export function ammodamagetypes(subject: BlueprintView): string[] | undefined {
    const attributes = projectilePart(subject, "Projectile", "Attributes");
    if (attributes === undefined) {
        return undefined;
    }
    return attributes.split(/\s+/).filter((word) => word !== "");
}

/**
 * Ammunition used per shot.
 */
export function ammoperaction(subject: BlueprintView): number | undefined {
    return intOrUndefined(subject.part("MissileWeapon", "AmmoPerAction"));
}

/**
 * Damage dice. Thrown weapons deal 1 unless they say otherwise.
 */
export function damage(subject: BlueprintView): string | undefined {
    let value: string | undefined;

    if (isMeleeWeapon(subject)) {
        value = subject.part("MeleeWeapon", "BaseDamage");
    }
    if (subject.hasPart("Gaslight")) {
        value = subject.part("Gaslight", "ChargedDamage");
    }
    if (subject.hasPart("ThrownWeapon")) {
        value = subject.specified("part", "GeomagneticDisc")
            ? subject.part("GeomagneticDisc", "Damage")
            : subject.part("ThrownWeapon", "Damage") ?? "1";
    }

    const projectileDamage = projectilePart(subject, "Projectile", "BaseDamage");
    return hasText(projectileDamage) ? projectileDamage : value;
}

/**
 * Drams of liquid used per shot.
 */
export function dramsperuse(subject: BlueprintView): number | undefined {
    // TODO: the blood-gradient hand vacuum uses a fraction of a dram per shot
    return subject.specified("part", "LiquidAmmoLoader") ? 1 : undefined;
}

/**
 * Elemental damage range, from an elemental mod or the weapon itself.
 */
export function elementaldamage(subject: BlueprintView): string | undefined {
    for (const mod of ["ModFlaming", "ModFreezing"]) {
        if (subject.specified("part", mod)) {
            const tier = intOrDefault(subject.part(mod, "Tier"), 0);
            return `${Math.trunc(tier * 0.8)}-${Math.trunc(tier * 1.2)}`;
        }
    }
    if (subject.specified("part", "ModElectrified")) {
        const tier = intOrDefault(subject.part("ModElectrified", "Tier"), 0);
        return `${tier}-${Math.trunc(tier * 1.5)}`;
    }
    return subject.part("MeleeWeapon", "ElementalDamage");
}

/**
 * Element of {@link elementaldamage}.
 */
export function elementaltype(subject: BlueprintView): string | undefined {
    if (subject.specified("part", "ModFlaming")) {
        return "Fire";
    }
    if (subject.specified("part", "ModFreezing")) {
        return "Cold";
    }
    if (subject.specified("part", "ModElectrified")) {
        return "Electric";
    }
    return subject.part("MeleeWeapon", "Element");
}

/**
 * Gas released where the projectile hits.
 */
export function gasemitted(subject: BlueprintView): string | undefined {
    return projectilePart(subject, "GasOnHit", "Blueprint");
}

export function ismissile(subject: BlueprintView): true | undefined {
    return subject.inheritsFrom("MissileWeapon") || subject.specified("part", "MissileWeapon") ? true : undefined;
}

export function isthrown(subject: BlueprintView): true | undefined {
    return subject.hasPart("ThrownWeapon") ? true : undefined;
}

/**
 * Whether the projectile is light (photons rather than matter).
 */
export function lightprojectile(subject: BlueprintView): true | undefined {
    return subject.hasTag("Light") ? true : undefined;
}

/**
 * Penetration, from the melee weapon, the projectile or the thrown weapon.
 */
export function pv(subject: BlueprintView): number | undefined {
    let value: number | undefined;

    if (isMeleeWeapon(subject)) {
        const bonus = subject.part("Gaslight", "ChargedPenetrationBonus") ?? subject.part("MeleeWeapon", "PenBonus");
        value = 4 + intOrDefault(bonus, 0);
    }

    const projectilePv = intOrUndefined(projectilePart(subject, "Projectile", "BasePenetration"));
    if (projectilePv !== undefined) {
        value = projectilePv + 4;
    }

    if (subject.hasPart("ThrownWeapon")) {
        value = intOrDefault(subject.part("ThrownWeapon", "Penetration"), 1) + 4;
    }

    return value;
}

/**
 * Penetration with the strength bonus cap of a melee weapon added.
 */
export function maxpv(subject: BlueprintView): number | undefined {
    const value = pv(subject);
    if (value === undefined || !isMeleeWeapon(subject)) {
        return value;
    }
    return value + intOrDefault(subject.part("MeleeWeapon", "MaxStrengthBonus"), 0);
}

/**
 * Whether the projectile passes through phase barriers.
 */
export function omniphaseprojectile(subject: BlueprintView): true | undefined {
    const projectile = projectileOf(subject);
    if (!projectile) {
        return undefined;
    }
    return projectile.specified("part", "OmniphaseProjectile") || projectile.specified("tag", "Omniphase")
        ? true
        : undefined;
}

/**
 * Whether the projectile passes through creatures.
 */
export function penetratingammo(subject: BlueprintView): true | undefined {
    return projectilePart(subject, "Projectile", "PenetrateCreatures") !== undefined ? true : undefined;
}

/**
 * Poison on-hit rules text.
 */
export function poisononhit(subject: BlueprintView): string | undefined {
    if (!subject.hasPart("PoisonOnHit")) {
        return undefined;
    }

    const chance = subject.part("PoisonOnHit", "Chance") ?? "100";
    const save = subject.part("PoisonOnHit", "Strength") ?? "15";
    const poisonDamage = subject.part("PoisonOnHit", "DamageIncrement") ?? "3d3";
    const duration = subject.part("PoisonOnHit", "Duration") ?? "6-9";
    return `${chance}% to poison on hit, toughness save ${save}. ${poisonDamage} damage for ${duration} turns.`;
}

/**
 * Whether the weapon's penetration depends on charge.
 */
export function pvpowered(subject: BlueprintView): true | undefined {
    const isVibro = vibro(subject) === true;

    if (isVibro && subject.specified("part", "MissileWeapon")) {
        return undefined;
    }
    if (isVibro && (!subject.hasPart("VibroWeapon") || intOrDefault(subject.part("VibroWeapon", "ChargeUse"), 0) > 0)) {
        return true;
    }
    if (subject.hasPart("Gaslight") && intOrDefault(subject.part("Gaslight", "ChargeUse"), 0) > 0) {
        return true;
    }
    if (subject.part("Projectile", "Attributes") === "Vorpal") {
        return true;
    }
    return undefined;
}

const kREALITY_DISTORTION_PARTS = ["Displacer", "SpaceTimeVortex", "EngulfingClones", "GreaterVoider"];

/**
 * Whether the item stops working under reality stabilization.
 */
export function realitydistortionbased(subject: BlueprintView): true | undefined {
    const projectile = projectileOf(subject);
    if (projectile && (
        projectile.part("TreatAsSolid", "RealityDistortionBased") === "true" ||
        projectile.part("VampiricWeapon", "RealityDistortionBased") === "true"
    )) {
        return true;
    }

    if (subject.part("MechanicalWings", "IsRealityDistortionBased") === "true") {
        return true;
    }
    if (subject.part("DeploymentGrenade", "UsabilityEvent") === "CheckRealityDistortionUsability") {
        return true;
    }
    return kREALITY_DISTORTION_PARTS.some((part) => subject.hasPart(part)) ? true : undefined;
}

/**
 * Temperature change when the projectile or weapon enters a cell.
 */
export function temponenter(subject: BlueprintView): string | undefined {
    const fromProjectile = projectilePart(subject, "TemperatureOnEntering", "Amount");
    return hasText(fromProjectile) ? fromProjectile : subject.part("TemperatureOnEntering", "Amount");
}

/**
 * Temperature change on hit.
 */
export function temponhit(subject: BlueprintView): string | undefined {
    const fromProjectile = projectilePart(subject, "TemperatureOnHit", "Amount");
    return hasText(fromProjectile) ? fromProjectile : subject.part("TemperatureOnHit", "Amount");
}

/**
 * Temperature limit of {@link temponhit}.
 */
export function temponhitmax(subject: BlueprintView): number | undefined {
    return intOrUndefined(projectilePart(subject, "TemperatureOnHit", "MaxTemp"))
        ?? intOrUndefined(subject.part("TemperatureOnHit", "MaxTemp"));
}

/**
 * Bonus or penalty to hit.
 */
export function tohit(subject: BlueprintView): number | undefined {
    if (subject.inheritsFrom("Armor")) {
        return intOrUndefined(subject.part("Armor", "ToHit"));
    }
    if (subject.specified("part", "MeleeWeapon")) {
        return intOrUndefined(subject.part("MeleeWeapon", "HitBonus"));
    }
    return undefined;
}

/**
 * Whether a weapon takes both hands.
 */
export function twohanded(subject: BlueprintView): boolean | undefined {
    if (!subject.inheritsFrom("MeleeWeapon") && !subject.inheritsFrom("MissileWeapon")) {
        return undefined;
    }

    // weapons that occupy a body part other than a hand, like a snout
    const slots = subject.tag("UsesSlots");
    if (hasText(slots) && slots !== "Hand") {
        return undefined;
    }

    const usesTwoSlots = subject.part("Physics", "bUsesTwoSlots") ?? subject.part("Physics", "UsesTwoSlots");
    return usesTwoSlots === "true" || usesTwoSlots === "True";
}

/**
 * Whether the weapon is a vibro weapon (adaptive penetration).
 */
export function vibro(subject: BlueprintView): true | undefined {
    if (subject.specified("part", "GeomagneticDisc")) {
        return true;
    }
    if (subject.specified("part", "MissileWeapon")) {
        const attributes = projectilePart(subject, "Projectile", "Attributes");
        return attributes?.split(" ").includes("Vorpal") ? true : undefined;
    }
    if (subject.inheritsFrom("MeleeWeapon") || subject.inheritsFrom("NaturalWeapon")) {
        return subject.hasPart("VibroWeapon") ? true : undefined;
    }
    return undefined;
}

/**
 * The weapon skill that applies.
 */
export function weaponskill(subject: BlueprintView): string | undefined {
    let skill: string | undefined;

    if (isMeleeWeapon(subject)) {
        skill = subject.part("MeleeWeapon", "Skill");
    }
    if (subject.inheritsFrom("MissileWeapon")) {
        skill = subject.part("MissileWeapon", "Skill") ?? skill;
    }
    if (subject.hasPart("Gaslight")) {
        skill = subject.part("Gaslight", "ChargedSkill");
    }

    if (subject.inheritsFrom("Projectile")) {
        return undefined;
    }
    if (subject.inheritsFrom("Shield")) {
        return "Shield";
    }
    return skill;
}
