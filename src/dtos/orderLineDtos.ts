import z from 'zod';
import type { ResolvedOrderLine } from '../services/orderLines/types';

export const ResolveLineRequest = z
  .object({
    rawText: z.string().min(1).max(500),
    autoConfirm: z.boolean().optional(),
    customerSegment: z.string().min(1).optional(),
  })
  .refine((body) => !body.autoConfirm || Boolean(body.customerSegment), {
    path: ['customerSegment'],
    message: 'customerSegment is required when autoConfirm is set',
  });

export const ResolveInvoiceLineRequest = z
  .object({
    description: z.string().min(1).max(500),
    quantity: z.union([z.number(), z.string()]).nullable().optional(),
    unit: z.string().nullable().optional(),
    unitPrice: z.union([z.number(), z.string()]).nullable().optional(),
    autoConfirm: z.boolean().optional(),
    customerSegment: z.string().min(1).optional(),
  })
  .refine((body) => !body.autoConfirm || Boolean(body.customerSegment), {
    path: ['customerSegment'],
    message: 'customerSegment is required when autoConfirm is set',
  });

export const ConfirmMatchRequest = z.object({
  parsedLineId: z.string().min(1),
  chosenProductId: z.string().min(1),
  customerSegment: z.string().min(1),
  quantity: z.number().positive().optional(),
  unit: z.string().min(1).optional(),
  allowProcurement: z.boolean().optional(),
});

export const OrderLineParams = z.object({
  lineId: z.string().min(1),
});

export type ResolveLineBody = z.infer<typeof ResolveLineRequest>;
export type ResolveInvoiceLineBody = z.infer<typeof ResolveInvoiceLineRequest>;
export type ConfirmMatchBody = z.infer<typeof ConfirmMatchRequest>;

export type ResolvedOrderLineDto = Omit<ResolvedOrderLine, 'createdAt' | 'updatedAt'> & {
  createdAt: string;
  updatedAt: string;
};

export function toResolvedOrderLineDto(line: ResolvedOrderLine): ResolvedOrderLineDto {
  return { ...line, createdAt: line.createdAt.toISOString(), updatedAt: line.updatedAt.toISOString() };
}
