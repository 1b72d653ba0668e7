import type { FunctionContext, HttpFunction, Table } from "@nimbus-fn/types";
import { Field, HttpApi, InjectTable } from "@nimbus-fn/core";
import { Order } from "../models/order";

export class ListOrdersRequest {
  @Field("string") customer?: string;
  @Field("integer") limit = 25;
}

/** Orders oldest first, optionally for one customer. */
@HttpApi("GET", "/orders", { request: ListOrdersRequest })
export class ListOrders implements HttpFunction<ListOrdersRequest, Order[]> {
  constructor(@InjectTable(Order) private readonly orders: Table<Order>) {}

  async handle(request: ListOrdersRequest, context: FunctionContext): Promise<Order[]> {
    const orders = await this.orders.scan({ signal: context.signal });
    return orders
      .filter((order) => request.customer === undefined || order.customer === request.customer)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .slice(0, request.limit);
  }
}
