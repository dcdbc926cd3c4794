export type { Block, BlockContent, BlockType, KnownBlockContent, UnsupportedBlockContent } from "./block.js";
export { blockPlainText, blockSchema, readBlockContent } from "./block.js";
export type {
  Annotations,
  Cover,
  DateValue,
  FileObject,
  Icon,
  Parent,
  PartialUser,
  RichText,
  SelectOption,
} from "./common.js";
export {
  annotationsSchema,
  coverSchema,
  dateValueSchema,
  fileObjectSchema,
  fileUrl,
  iconSchema,
  jsonObjectSchema,
  jsonValueSchema,
  parentSchema,
  parseModel,
  partialUserSchema,
  richTextSchema,
  richTextToPlain,
  selectOptionSchema,
} from "./common.js";
export type { Database } from "./database.js";
export { databaseSchema, databaseTitle } from "./database.js";
export type { ListResponse } from "./list.js";
export { rawListSchema } from "./list.js";
export type { Page, PropertyItem } from "./page.js";
export { findTitleProperty, pageSchema, pageTitle, propertyItemSchema } from "./page.js";
export type {
  DatabaseProperty,
  KnownDatabaseProperty,
  KnownPropertyValue,
  PropertyType,
  PropertyValue,
  UnknownDatabaseProperty,
  UnknownPropertyValue,
} from "./property.js";
export {
  databasePropertySchema,
  parseDatabaseProperty,
  parsePropertyValue,
  propertyOptions,
  propertyValueSchema,
  propertyValueToJson,
} from "./property.js";
export type { User } from "./user.js";
export { isBot, userEmail, userSchema } from "./user.js";
