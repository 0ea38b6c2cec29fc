import { queryGeneric, type DataModelFromSchemaDefinition, type GenericQueryCtx } from "convex/server";
import { v } from "convex/values";

import { ADMIN_SETTINGS_TABLE, REFERENCE_TABLE_STORAGE } from "./model/constants";
import { AUDIT_FIELD_NAMES } from "./model/fields";
import type schema from "./schema";

const referenceTableArg = v.union(
  v.literal("vehicleClassification"),
  v.literal("coverageDescriptors"),
  v.literal("termMultipliers"),
  v.literal("deductibleMultipliers"),
  v.literal("mileageBrackets"),
  v.literal("ageBrackets"),
  v.literal("baseRates"),
  v.literal("rateMatrix"),
);

export const toReferenceRow = (doc: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(doc).filter(([field]) => !AUDIT_FIELD_NAMES.has(field)));

export const listTable = queryGeneric({
  args: {
    table: referenceTableArg,
  },
  handler: async (ctx, args) => {
    const docs = await ctx.db.query(REFERENCE_TABLE_STORAGE[args.table]).collect();
    return docs.map(toReferenceRow);
  },
});

export const getAdminSetting = queryGeneric({
  args: {
    category: v.string(),
    key: v.string(),
  },
  handler: async (ctx: GenericQueryCtx<DataModelFromSchemaDefinition<typeof schema>>, args) => {
    const setting = await ctx.db
      .query(ADMIN_SETTINGS_TABLE)
      .withIndex("by_category_key", (q) => q.eq("category", args.category).eq("key", args.key))
      .unique();

    return setting?.value ?? null;
  },
});
