import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const IDENTITIES_TABLE = "identities" as const;
export const DETECTION_EVENTS_TABLE = "detection_events" as const;

export const identities = sqliteTable(IDENTITIES_TABLE, {
  name: text("name").primaryKey().notNull(),
  featureVectorJson: text("feature_vector_json").notNull(),
  imagePath: text("image_path"),
  registeredAt: integer("registered_at").notNull(),
});

export type IdentityRow = typeof identities.$inferSelect;

export const detectionEvents = sqliteTable(DETECTION_EVENTS_TABLE, {
  id: integer("id").primaryKey({ autoIncrement: true }),
  identityLabel: text("identity_label").notNull(),
  matchedIdentity: text("matched_identity"),
  similarity: real("similarity").notNull(),
  emotion: text("emotion").notNull(),
  instantaneousMotion: real("instantaneous_motion").notNull(),
  cumulativeMotion: real("cumulative_motion").notNull(),
  isKnown: integer("is_known", { mode: "boolean" }).notNull(),
  outcome: text("outcome").notNull(),
  boundingBoxJson: text("bounding_box_json").notNull(),
  timestamp: integer("timestamp").notNull(),
});

export type DetectionEventRow = typeof detectionEvents.$inferSelect;

export const schema = {
  identities,
  detectionEvents,
};
