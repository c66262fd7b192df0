import { z } from 'zod';

export const ODataCollectionSchema = z.object({
  value: z.array(z.unknown()),
});

export const RawPersonSchema = z.object({
  PersonID: z.number(),
  FirstName: z.string().nullish(),
  LastName: z.string().nullish(),
  Email: z.string().nullish(),
  IsCurrent: z.boolean().nullish(),
});

export const RawPositionSchema = z.object({
  PositionID: z.number(),
  Description: z.string().nullish(),
});

export const RawCommitteeSchema = z.object({
  CommitteeID: z.number(),
  Name: z.string().nullish(),
  KnessetNum: z.number().nullish(),
  CommitteeTypeDesc: z.string().nullish(),
  CategoryDesc: z.string().nullish(),
  Email: z.string().nullish(),
  IsCurrent: z.boolean().nullish(),
});

export const RawPersonToPositionSchema = z.object({
  PersonToPositionID: z.number(),
  PersonID: z.number().nullish(),
  PositionID: z.number().nullish(),
  KnessetNum: z.number().nullish(),
  CommitteeID: z.number().nullish(),
  CommitteeName: z.string().nullish(),
  DutyDesc: z.string().nullish(),
  StartDate: z.string().nullish(),
  FinishDate: z.string().nullish(),
  IsCurrent: z.boolean().nullish(),
  KNS_Person: RawPersonSchema.nullish(),
  KNS_Position: RawPositionSchema.nullish(),
});

export const RawStatusSchema = z.object({
  StatusID: z.number(),
  Desc: z.string().nullish(),
});

export const RawBillInitiatorSchema = z.object({
  BillInitiatorID: z.number(),
  BillID: z.number().nullish(),
  PersonID: z.number(),
  IsInitiator: z.boolean().nullish(),
  Ordinal: z.number().nullish(),
  KNS_Person: RawPersonSchema.nullish(),
});

export const RawBillSchema = z.object({
  BillID: z.number(),
  KnessetNum: z.number().nullish(),
  Name: z.string().nullish(),
  SubTypeDesc: z.string().nullish(),
  Number: z.number().nullish(),
  PrivateNumber: z.number().nullish(),
  CommitteeID: z.number().nullish(),
  StatusID: z.number().nullish(),
  PublicationDate: z.string().nullish(),
  LastUpdatedDate: z.string().nullish(),
  SummaryLaw: z.string().nullish(),
  KNS_Status: RawStatusSchema.nullish(),
  KNS_BillInitiators: z.array(RawBillInitiatorSchema).nullish(),
});

export const RawDocumentBillSchema = z.object({
  DocumentBillID: z.number(),
  BillID: z.number(),
  GroupTypeID: z.number().nullish(),
  GroupTypeDesc: z.string().nullish(),
  ApplicationDesc: z.string().nullish(),
  FilePath: z.string().nullish(),
  LastUpdatedDate: z.string().nullish(),
});

export type RawPerson = z.infer<typeof RawPersonSchema>;
export type RawCommittee = z.infer<typeof RawCommitteeSchema>;
export type RawPersonToPosition = z.infer<typeof RawPersonToPositionSchema>;
export type RawBillInitiator = z.infer<typeof RawBillInitiatorSchema>;
export type RawBill = z.infer<typeof RawBillSchema>;
export type RawDocumentBill = z.infer<typeof RawDocumentBillSchema>;
