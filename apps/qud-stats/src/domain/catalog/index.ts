/**
 * @fileoverview Derived property catalog
 *
 * The lookup table of every derived property, keyed by the id consumers
 * query by. Simple field reads are not listed here; they are declared in
 * `config/properties.yml`.
 *
 * @module domain/catalog
 */

import type { PropertyDefinition } from "@bpstats/engine";
import type { QudTables } from "../tables.js";
import * as attributes from "./attributes.js";
import { createCatalogContext, type CatalogFunction } from "./CatalogContext.js";
import * as charge from "./charge.js";
import * as creatures from "./creatures.js";
import * as defense from "./defense.js";
import { desc } from "./description.js";
import * as identification from "./identification.js";
import * as items from "./items.js";
import * as presentation from "./presentation.js";
import * as weapons from "./weapons.js";

export { createCatalogContext, type CatalogContext, type CatalogFunction } from "./CatalogContext.js";

/**
 * Every derived property, by id.
 */
export const kCATALOG: Readonly<Record<string, CatalogFunction>> = {
    // attributes
    strength             : attributes.strength,
    agility              : attributes.agility,
    toughness            : attributes.toughness,
    intelligence         : attributes.intelligence,
    willpower            : attributes.willpower,
    ego                  : attributes.ego,
    strengthmult         : attributes.strengthmult,
    agilitymult          : attributes.agilitymult,
    toughnessmult        : attributes.toughnessmult,
    intelligencemult     : attributes.intelligencemult,
    willpowermult        : attributes.willpowermult,
    egomult              : attributes.egomult,
    strengthextrinsic    : attributes.strengthextrinsic,
    agilityextrinsic     : attributes.agilityextrinsic,
    toughnessextrinsic   : attributes.toughnessextrinsic,
    intelligenceextrinsic: attributes.intelligenceextrinsic,
    willpowerextrinsic   : attributes.willpowerextrinsic,
    egoextrinsic         : attributes.egoextrinsic,

    // defense
    av             : defense.av,
    dv             : defense.dv,
    ma             : defense.ma,
    marange        : defense.marange,
    hasmentalshield: defense.hasmentalshield,
    heat           : defense.heat,
    cold           : defense.cold,
    acid           : defense.acid,
    electric       : defense.electric,
    electrical     : defense.electrical,
    quickness      : defense.quickness,

    // weapons
    accuracy              : weapons.accuracy,
    ammo                  : weapons.ammo,
    ammodamagetypes       : weapons.ammodamagetypes,
    ammoperaction         : weapons.ammoperaction,
    damage                : weapons.damage,
    dramsperuse           : weapons.dramsperuse,
    elementaldamage       : weapons.elementaldamage,
    elementaltype         : weapons.elementaltype,
    gasemitted            : weapons.gasemitted,
    ismissile             : weapons.ismissile,
    isthrown              : weapons.isthrown,
    lightprojectile       : weapons.lightprojectile,
    maxpv                 : weapons.maxpv,
    omniphaseprojectile   : weapons.omniphaseprojectile,
    penetratingammo       : weapons.penetratingammo,
    poisononhit           : weapons.poisononhit,
    pv                    : weapons.pv,
    pvpowered             : weapons.pvpowered,
    realitydistortionbased: weapons.realitydistortionbased,
    temponenter           : weapons.temponenter,
    temponhit             : weapons.temponhit,
    temponhitmax          : weapons.temponhitmax,
    tohit                 : weapons.tohit,
    twohanded             : weapons.twohanded,
    vibro                 : weapons.vibro,
    weaponskill           : weapons.weaponskill,

    // charge
    chargeused        : charge.chargeused,
    chargefunction    : charge.chargefunction,
    imprintchargecost : charge.imprintchargecost,
    empsensitive      : charge.empsensitive,
    energycellrequired: charge.energycellrequired,

    // identification and mods
    complexity    : identification.complexity,
    unknownname   : identification.unknownname,
    unknownaltname: identification.unknownaltname,
    modcount      : identification.modcount,
    mods          : identification.mods,
    bits          : identification.bits,
    canbuild      : identification.canbuild,
    candisassemble: identification.candisassemble,
    tier          : identification.tier,

    // creatures
    animatable      : creatures.animatable,
    aquatic         : creatures.aquatic,
    bleedliquid     : creatures.bleedliquid,
    corpse          : creatures.corpse,
    corpsechance    : creatures.corpsechance,
    demeanor        : creatures.demeanor,
    dynamictable    : creatures.dynamictable,
    faction         : creatures.faction,
    gender          : creatures.gender,
    hp              : creatures.hp,
    hurtbydefoliant : creatures.hurtbydefoliant,
    hurtbyfungicide : creatures.hurtbyfungicide,
    inventory       : creatures.inventory,
    isswarmer       : creatures.isswarmer,
    lv              : creatures.lv,
    movespeed       : creatures.movespeed,
    mutatedplant    : creatures.mutatedplant,
    mutations       : creatures.mutations,
    noprone         : creatures.noprone,
    pettable        : creatures.pettable,
    phase           : creatures.phase,
    pronouns        : creatures.pronouns,
    skills          : creatures.skills,
    waterritualable : creatures.waterritualable,
    waterritualskill: creatures.waterritualskill,
    xpvalue         : creatures.xpvalue,
    xptier          : creatures.xptier,

    // items
    chairlevel      : items.chairlevel,
    commerce        : items.commerce,
    cookeffect      : items.cookeffect,
    cursed          : items.cursed,
    destroyonunequip: items.destroyonunequip,
    exoticfood      : items.exoticfood,
    flametemperature: items.flametemperature,
    flyover         : items.flyover,
    illoneat        : items.illoneat,
    iscurrency      : items.iscurrency,
    isfungus        : items.isfungus,
    ismeat          : items.ismeat,
    isoccluding     : items.isoccluding,
    isplant         : items.isplant,
    leakswhenbroken : items.leakswhenbroken,
    lightradius     : items.lightradius,
    metal           : items.metal,
    movespeedbonus  : items.movespeedbonus,
    oneat           : items.oneat,
    reputationbonus : items.reputationbonus,
    savemodifieramt : items.savemodifieramt,
    seeping         : items.seeping,
    solid           : items.solid,
    spectacles      : items.spectacles,
    usesslots       : items.usesslots,
    weight          : items.weight,
    wornon          : items.wornon,

    // presentation
    id            : presentation.id,
    inheritingfrom: presentation.inheritingfrom,
    displayname   : presentation.displayname,
    title         : presentation.title,
    renderstr     : presentation.renderstr,
    colorstr      : presentation.colorstr,
    desc,
};

/**
 * Property definitions for the whole catalog, evaluated against the given tables.
 */
export function createCatalog(tables: QudTables): PropertyDefinition[] {
    return Object.entries(kCATALOG).map(([id, evaluate]): PropertyDefinition => ({
        id,
        evaluate: (subject, context) => evaluate(subject, createCatalogContext(tables, context)),
    }));
}

export * from "./attributes.js";
export * from "./charge.js";
export * from "./creatures.js";
export * from "./defense.js";
export * from "./description.js";
export * from "./identification.js";
export * from "./items.js";
export * from "./presentation.js";
export * from "./weapons.js";
