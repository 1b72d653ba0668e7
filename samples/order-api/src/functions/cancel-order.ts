import type { FunctionContext, HttpFunction, Table } from "@nimbus-fn/types";
import { ConflictException, HttpApi, InjectTable, NotFoundException } from "@nimbus-fn/core";
import { Order } from "../models/order";
import { OrderByIdRequest } from "./get-order";

@HttpApi("DELETE", "/orders/{id}", { request: OrderByIdRequest })
export class CancelOrder implements HttpFunction<OrderByIdRequest, void> {
  constructor(@InjectTable(Order) private readonly orders: Table<Order>) {}

  async handle(request: OrderByIdRequest, context: FunctionContext): Promise<void> {
    const order = await this.orders.get(request.id, undefined, { signal: context.signal });
    if (!order) throw new NotFoundException(`Order ${request.id} not found`);
    if (order.status === "cancelled") throw new ConflictException(`Order ${request.id} is already cancelled`);

    order.status = "cancelled";
    await this.orders.put(order, { signal: context.signal });
  }
}
