/**
 * Well-known base game FormIDs (keywords used for weapon and item
 * classification), keyed by full FormID from the base game master.
 */
export const KNOWN_FORM_IDS: ReadonlyMap<number, string> = new Map<number, string>([
  [0x0004a0a2, 'WeaponTypeRifle'],
  [0x0004a0a1, 'WeaponTypePistol'],
  [0x00054c45, 'WeaponTypeShotgun'],
  [0x000a36be, 'WeaponTypeSniper'],
  [0x000a36d6, 'WeaponTypeGatling'],
  [0x00054c46, 'WeaponTypeLaser'],
  [0x000a36d4, 'WeaponTypePlasma'],
  [0x000a36d5, 'WeaponTypeHeavyGun'],
  [0x0004a0a4, 'WeaponTypeMelee1H'],
  [0x0004a0a5, 'WeaponTypeMelee2H'],
  [0x0004a0a6, 'WeaponTypeUnarmed'],
  [0x0004a0a3, 'WeaponTypeAutomatic'],
  [0x000a36d7, 'WeaponTypeGrenade'],
  [0x000a36d8, 'WeaponTypeMine'],
  [0x000424ef, 'ObjectTypeWeapon'],
  [0x000424ee, 'ObjectTypeArmor'],
  [0x000424f0, 'ObjectTypeDrink'],
  [0x000424f1, 'ObjectTypeFood'],
]);

/** Record types whose analyses need keyword names resolved. */
export const KEYWORD_CONSUMER_TYPES: ReadonlySet<string> = new Set(['WEAP', 'AMMO', 'ARMO', 'NPC_', 'PERK']);
