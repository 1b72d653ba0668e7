import { Entity, PartitionKey } from "@nimbus-fn/core";

export type OrderStatus = "open" | "cancelled";

@Entity()
export class Order {
  @PartitionKey() id = "";
  customer = "";
  total = 0;
  status: OrderStatus = "open";
  createdAt = "";
}
