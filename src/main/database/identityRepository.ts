import { asc, eq } from "drizzle-orm";
import { getLogger, toErrorPayload } from "../../shared/logger";
import type { FeatureVector, Identity } from "../../shared/types/identity";
import { isFeatureVector } from "../../shared/validation/detection";
import { getDatabase } from "./client";
import { type IdentityRow, identities } from "./schema";

const logger = getLogger("identity-repository", "main");

const parseFeatureVector = (json: string): FeatureVector | null => {
  try {
    const parsed: unknown = JSON.parse(json);
    return isFeatureVector(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

const mapRowToIdentity = (row: IdentityRow): Identity | null => {
  const featureVector = parseFeatureVector(row.featureVectorJson);
  if (!featureVector) {
    logger.warn("Skipping identity row with an unreadable feature vector", {
      name: row.name,
    });
    return null;
  }
  return {
    name: row.name,
    featureVector,
    registeredAt: row.registeredAt,
    imagePath: row.imagePath ?? null,
  };
};

export const saveIdentity = (identity: Identity): void => {
  const db = getDatabase();
  const values = {
    featureVectorJson: JSON.stringify(identity.featureVector),
    imagePath: identity.imagePath,
  };

  try {
    db.insert(identities)
      .values({ name: identity.name, registeredAt: identity.registeredAt, ...values })
      // registered_at is left alone so reload order follows first registration.
      .onConflictDoUpdate({
        target: identities.name,
        set: values,
      })
      .run();
  } catch (error) {
    logger.error("Failed to save identity", {
      name: identity.name,
      ...toErrorPayload(error),
    });
    throw error;
  }
};

export const deleteIdentity = (name: string): void => {
  const db = getDatabase();
  db.delete(identities).where(eq(identities.name, name)).run();
};

/** Stored identities in registration order. */
export const listStoredIdentities = (): Identity[] => {
  const db = getDatabase();
  const rows = db
    .select()
    .from(identities)
    .orderBy(asc(identities.registeredAt))
    .all();

  return rows.flatMap((row) => {
    const identity = mapRowToIdentity(row);
    return identity ? [identity] : [];
  });
};
