import type { FunctionContext, HttpFunction, NimbusLogger, Table } from "@nimbus-fn/types";
import {
  BadRequestException,
  Field,
  FunctionConfig,
  HttpApi,
  Inject,
  InjectLogger,
  InjectTable,
} from "@nimbus-fn/core";
import { Order } from "../models/order";
import { OrderIds } from "../services/order-ids";

export class CreateOrderRequest {
  @Field("string", { required: true }) customer = "";
  @Field("number", { required: true }) total = 0;
}

@HttpApi("POST", "/orders", { request: CreateOrderRequest, response: Order })
@FunctionConfig({ memoryMb: 512 })
export class CreateOrder implements HttpFunction<CreateOrderRequest, Order> {
  constructor(
    @InjectTable(Order) private readonly orders: Table<Order>,
    @Inject(OrderIds) private readonly ids: OrderIds,
    @InjectLogger() private readonly logger: NimbusLogger,
  ) {}

  async handle(request: CreateOrderRequest, context: FunctionContext): Promise<Order> {
    if (request.total < 0) throw new BadRequestException("total must not be negative");

    const order = Object.assign(new Order(), {
      id: this.ids.next(),
      customer: request.customer,
      total: request.total,
      createdAt: new Date().toISOString(),
    });
    await this.orders.put(order, { signal: context.signal });

    this.logger.info("Order created", { id: order.id, customer: order.customer });
    return order;
  }
}
