import { z } from 'zod';

export const RawFactionSchema = z.object({
  faction_id: z.number().nullish(),
  faction_name: z.string().nullish(),
  start_date: z.string().nullish(),
  finish_date: z.string().nullish(),
  knesset: z.number().nullish(),
});

export const RawMinistrySchema = z.object({
  govministry_id: z.number().nullish(),
  govministry_name: z.string().nullish(),
  position_name: z.string().nullish(),
  start_date: z.string().nullish(),
  finish_date: z.string().nullish(),
  knesset: z.number().nullish(),
});

export const RawMemberCommitteeSchema = z.object({
  committee_id: z.number().nullish(),
  committee_name: z.string().nullish(),
  position_name: z.string().nullish(),
  start_date: z.string().nullish(),
  finish_date: z.string().nullish(),
  knesset: z.number().nullish(),
});

// Lists arrive with null holes, so every element is nullable
export const RawMemberSchema = z.object({
  mk_individual_id: z.number(),
  mk_individual_first_name: z.string().nullish(),
  mk_individual_name: z.string().nullish(),
  mk_individual_email: z.string().nullish(),
  PersonID: z.number().nullish(),
  IsCurrent: z.boolean().nullish(),
  altnames: z.array(z.string().nullable()).nullish(),
  factions: z.array(RawFactionSchema.nullable()).nullish(),
  govministries: z.array(RawMinistrySchema.nullable()).nullish(),
  committee_positions: z.array(RawMemberCommitteeSchema.nullable()).nullish(),
});

export type RawFaction = z.infer<typeof RawFactionSchema>;
export type RawMinistry = z.infer<typeof RawMinistrySchema>;
export type RawMemberCommittee = z.infer<typeof RawMemberCommitteeSchema>;
export type RawMember = z.infer<typeof RawMemberSchema>;
