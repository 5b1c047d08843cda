export type { IPhoneStore } from './IPhoneStore.js';
export { phoneRecordSchema, phoneCatalogSchema, type PhoneRecord } from './phoneTypes.js';
export { InMemoryPhoneStore } from './InMemoryPhoneStore.js';
export { SqlitePhoneStore, type SqlitePhoneStoreOptions } from './SqlitePhoneStore.js';
export { createPhoneStore, type PhoneStoreType, type PhoneStoreFactoryOptions, type PhoneStoreFactoryResult } from './phoneStoreFactory.js';
export {
  parsePrice,
  parseBatteryMah,
  parseMainCameraMp,
  parseRamGb,
  hasHighRefreshRate,
  hasAmoledPanel,
} from './fieldParsers.js';
export { stripBrandTokens, findByExactOrSubstringName } from './nameLookup.js';
