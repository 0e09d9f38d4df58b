import { badRequest, notFound } from "../errors.js";
import type { Store } from "../store.js";
import type { NewOrder, Order, OrderStatus } from "../types.js";
import { lockUser } from "./auth.js";
import { getStock } from "./market.js";

// Share quantities are floats; anything closer than this counts as equal.
const SHARE_EPSILON = 1e-9;

type Execution = { ok: true; order: Order } | { ok: false; reason: string };

export async function placeOrder(store: Store, userId: string, input: NewOrder): Promise<Order> {
  const symbol = input.symbol.toUpperCase();

  const stock = await getStock(store, symbol);
  if (!stock) {
    throw notFound(`Stock ${symbol} not found`);
  }
  const currentPrice = stock.currentPrice;

  if (input.orderType === "limit" && !input.limitPrice) {
    throw badRequest("Limit price is required for limit orders");
  }

  const order = await store.createOrder(userId, { ...input, symbol });

  if (input.orderType === "market") {
    return executeOrder(store, order, currentPrice);
  }

  // Limits that are already marketable fill at the current (better or equal) price.
  const limit = input.limitPrice ?? 0;
  const marketable = input.side === "buy" ? limit >= currentPrice : limit <= currentPrice;
  if (marketable) {
    return executeOrder(store, order, currentPrice);
  }
  return order;
}

/**
 * Fills `order` at `price`, moving cash and shares in one transaction. When
 * the user cannot cover it the order is marked rejected and a 400 is thrown.
 */
export async function executeOrder(store: Store, order: Order, price: number): Promise<Order> {
  const result = await store.transaction(async (tx): Promise<Execution> => {
    const user = await lockUser(tx, order.userId);
    const totalCost = price * order.quantity;
    const holding = await tx.getHolding(order.userId, order.symbol);

    if (order.side === "buy") {
      if (user.balance < totalCost) {
        return {
          ok: false,
          reason: `Insufficient funds. Required: $${totalCost.toFixed(2)}, Available: $${user.balance.toFixed(2)}`,
        };
      }
      await tx.adjustBalance(user.id, -totalCost);

      if (holding) {
        const totalShares = holding.quantity + order.quantity;
        const totalValue = holding.quantity * holding.averageBuyPrice + order.quantity * price;
        await tx.saveHolding({ ...holding, quantity: totalShares, averageBuyPrice: totalValue / totalShares });
      } else {
        await tx.saveHolding({
          userId: user.id,
          symbol: order.symbol,
          quantity: order.quantity,
          averageBuyPrice: price,
        });
      }
    } else {
      if (!holding || holding.quantity < order.quantity - SHARE_EPSILON) {
        const available = holding ? holding.quantity : 0;
        return {
          ok: false,
          reason: `Insufficient shares. Required: ${order.quantity}, Available: ${available}`,
        };
      }
      await tx.adjustBalance(user.id, totalCost);

      const remaining = holding.quantity - order.quantity;
      if (remaining <= SHARE_EPSILON) {
        await tx.deleteHolding(user.id, order.symbol);
      } else {
        await tx.saveHolding({ ...holding, quantity: remaining });
      }
    }

    const filled = await tx.updateOrder(order.id, {
      status: "filled",
      filledQuantity: order.quantity,
      filledPrice: price,
    });
    if (!filled) throw notFound("Order not found");
    return { ok: true, order: filled };
  });

  if (!result.ok) {
    await store.updateOrder(order.id, { status: "rejected" });
    throw badRequest(result.reason);
  }
  return result.order;
}

export async function getOrders(store: Store, userId: string, status?: OrderStatus): Promise<Order[]> {
  return store.listOrders(userId, status);
}

export async function getOrder(store: Store, userId: string, orderId: string): Promise<Order> {
  const order = await store.getOrder(userId, orderId);
  if (!order) {
    throw notFound("Order not found");
  }
  return order;
}

export async function cancelOrder(store: Store, userId: string, orderId: string): Promise<Order> {
  const order = await getOrder(store, userId, orderId);
  if (order.status !== "pending") {
    throw badRequest(`Cannot cancel order with status: ${order.status}`);
  }
  const cancelled = await store.updateOrder(order.id, { status: "cancelled" });
  if (!cancelled) throw notFound("Order not found");
  return cancelled;
}
