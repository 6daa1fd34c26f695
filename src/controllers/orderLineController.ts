import type { ConfirmMatchBody, ResolveInvoiceLineBody, ResolveLineBody } from '../dtos/orderLineDtos';
import { toResolvedOrderLineDto } from '../dtos/orderLineDtos';
import type { OrderLinePipelineService } from '../services/OrderLinePipelineService';

export class OrderLineController {
  constructor(private readonly pipeline: OrderLinePipelineService) {}

  resolve = async (body: ResolveLineBody) => {
    const view = await this.pipeline.resolveLine(body.rawText, {
      autoConfirm: body.autoConfirm,
      customerSegment: body.customerSegment,
    });
    return { ...view, resolvedLine: view.resolvedLine ? toResolvedOrderLineDto(view.resolvedLine) : null };
  };

  resolveInvoiceLine = async (body: ResolveInvoiceLineBody) => {
    const { autoConfirm, customerSegment, ...line } = body;
    const view = await this.pipeline.resolveInvoiceLine(line, { autoConfirm, customerSegment });
    return { ...view, resolvedLine: view.resolvedLine ? toResolvedOrderLineDto(view.resolvedLine) : null };
  };

  confirm = async (body: ConfirmMatchBody) => {
    return toResolvedOrderLineDto(await this.pipeline.confirmMatch(body));
  };

  commit = async (lineId: string) => {
    return toResolvedOrderLineDto(await this.pipeline.commitLine(lineId));
  };

  cancel = async (lineId: string) => {
    return toResolvedOrderLineDto(await this.pipeline.cancelLine(lineId));
  };
}
