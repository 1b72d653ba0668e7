import type { FunctionContext, HttpFunction, Table } from "@nimbus-fn/types";
import { Field, HttpApi, InjectTable, NotFoundException } from "@nimbus-fn/core";
import { Order } from "../models/order";

export class OrderByIdRequest {
  @Field("string", { required: true }) id = "";
}

@HttpApi("GET", "/orders/{id}", { request: OrderByIdRequest, response: Order })
export class GetOrder implements HttpFunction<OrderByIdRequest, Order> {
  constructor(@InjectTable(Order) private readonly orders: Table<Order>) {}

  async handle(request: OrderByIdRequest, context: FunctionContext): Promise<Order> {
    const order = await this.orders.get(request.id, undefined, { signal: context.signal });
    if (!order) throw new NotFoundException(`Order ${request.id} not found`);
    return order;
  }
}
