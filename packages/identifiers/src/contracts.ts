import {z} from 'zod';

// Unpaired surrogates cannot be percent-encoded.
const LONE_SURROGATE = /\p{Cs}/u;

export const isWellFormedPart = (part: string): boolean => !LONE_SURROGATE.test(part);

export const IdentifierPartSchema = z
  .string()
  .min(1)
  .refine(isWellFormedPart, {message: 'Identifier part contains an unpaired surrogate'});

export const MemberIdentifierSchema = z
  .object({
    objectType: z.literal('MEMBER'),
    instance: IdentifierPartSchema,
    memberClass: IdentifierPartSchema,
    memberCode: IdentifierPartSchema
  })
  .strict();

export const SubsystemIdentifierSchema = z
  .object({
    objectType: z.literal('SUBSYSTEM'),
    instance: IdentifierPartSchema,
    memberClass: IdentifierPartSchema,
    memberCode: IdentifierPartSchema,
    subsystemCode: IdentifierPartSchema
  })
  .strict();

export const ClientIdentifierSchema = z.discriminatedUnion('objectType', [
  MemberIdentifierSchema,
  SubsystemIdentifierSchema
]);

export const ServiceIdentifierSchema = z
  .object({
    objectType: z.literal('SERVICE'),
    instance: IdentifierPartSchema,
    memberClass: IdentifierPartSchema,
    memberCode: IdentifierPartSchema,
    // Absent for services provided by the member itself.
    subsystemCode: IdentifierPartSchema.optional(),
    serviceCode: IdentifierPartSchema,
    serviceVersion: IdentifierPartSchema.optional()
  })
  .strict();

export const SecurityServerIdentifierSchema = z
  .object({
    objectType: z.literal('SERVER'),
    instance: IdentifierPartSchema,
    memberClass: IdentifierPartSchema,
    memberCode: IdentifierPartSchema,
    serverCode: IdentifierPartSchema
  })
  .strict();

export type MemberIdentifier = z.infer<typeof MemberIdentifierSchema>;
export type SubsystemIdentifier = z.infer<typeof SubsystemIdentifierSchema>;
export type ClientIdentifier = z.infer<typeof ClientIdentifierSchema>;
export type ServiceIdentifier = z.infer<typeof ServiceIdentifierSchema>;
export type SecurityServerIdentifier = z.infer<typeof SecurityServerIdentifierSchema>;

export type XRoadIdentifier = ClientIdentifier | ServiceIdentifier | SecurityServerIdentifier;
