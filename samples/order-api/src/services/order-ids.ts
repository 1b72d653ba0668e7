import { randomUUID } from "node:crypto";
import { Injectable } from "@nimbus-fn/core";

@Injectable()
export class OrderIds {
  next(): string {
    return `ord_${randomUUID()}`;
  }
}
