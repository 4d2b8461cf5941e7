import { z } from "zod";
import { defineTool, type ToolResult } from "../types/tool";
import { SecurityViolationError } from "../core/errors";
import retailData from "./retail-data.json";

const ORDER_ID_PATTERN = "#?\\b([A-Z]\\d{3,})\\b";

const OrderSchema = z.object({
  id: z.string(),
  customerId: z.string(),
  status: z.enum(["processing", "shipped", "delivered"]),
  deliveredAt: z.string().nullable(),
  returnable: z.boolean(),
  items: z.array(z.string()),
});

const ProductSchema = z.object({
  sku: z.string(),
  name: z.string(),
  category: z.string(),
  tags: z.array(z.string()),
  price: z.number(),
  costBasis: z.number(),
});

const RetailDataSchema = z.object({
  orders: z.array(OrderSchema),
  products: z.array(ProductSchema),
  loyalty: z.record(z.string()),
  services: z.array(z.string()),
});

export type Order = z.infer<typeof OrderSchema>;
export type Product = z.infer<typeof ProductSchema>;

const data = RetailDataSchema.parse(retailData);

export function findOrder(orderId: string): Order | undefined {
  const normalized = orderId.replace(/^#/, "").toUpperCase();
  return data.orders.find(order => order.id === normalized);
}

// Products carrying the preference as a tag or category come first
export function rankProducts(preference: string | undefined, limit = 3): Product[] {
  if (!preference) return data.products.slice(0, limit);
  const wanted = preference.toLowerCase();
  return data.products
    .map((product, idx) => ({
      product,
      idx,
      hits: product.tags.filter(tag => wanted.includes(tag)).length + (wanted.includes(product.category) ? 1 : 0),
    }))
    .filter(entry => entry.hits > 0)
    .sort((a, b) => b.hits - a.hits || a.idx - b.idx)
    .slice(0, limit)
    .map(entry => entry.product);
}

// Look up an order owned by the current customer
export const lookupOrderTool = defineTool({
  name: "lookup_order",
  description: "Look up an order by its number and return its status and items",
  inputSchema: z.object({
    order_id: z.string().describe("Order number, e.g. A100"),
  }),
  parameters: {
    order_id: { source: "customer", description: "The order number", pattern: ORDER_ID_PATTERN },
  },
  maxRetries: 1,
  retryable: true,
  execute: async (context, args) => {
    const order = findOrder(args.order_id);
    if (!order) {
      return { error: `Order ${args.order_id} was not found`, control: { retryAllowed: false } };
    }
    if (order.customerId !== context.customerId) {
      throw new SecurityViolationError(`Order ${order.id} does not belong to customer ${context.customerId}`);
    }
    return {
      data: { id: order.id, status: order.status, items: order.items, returnable: order.returnable },
      cannedFields: { order_id: order.id, order_status: order.status },
    };
  },
});

// Start a return for a delivered order inside its return window
export const processReturnTool = defineTool({
  name: "process_return",
  description: "Start a return for an order and issue a return number",
  inputSchema: z.object({
    order_id: z.string().describe("Order number to return"),
  }),
  parameters: {
    order_id: {
      source: "customer",
      description: "The order number",
      fromTool: { tool: "lookup_order", path: "id" },
      pattern: ORDER_ID_PATTERN,
    },
  },
  dependsOn: ["lookup_order"],
  execute: async (_context, args) => {
    const order = findOrder(args.order_id);
    if (!order || !order.returnable) {
      return { error: `Order ${args.order_id} is not eligible for a return`, control: { retryAllowed: false } };
    }
    const returnId = `RMA-${order.id}`;
    return {
      data: { orderId: order.id, returnId, status: "initiated" },
      cannedFields: { order_id: order.id, return_id: returnId },
      variables: { last_return_id: returnId },
    };
  },
});

export const recommendProductsTool = defineTool({
  name: "recommend_products",
  description: "Suggest products for the customer's stated preference",
  inputSchema: z.object({
    preference: z.string().optional().describe("Activity or feature the customer cares about"),
  }),
  parameters: {
    preference: {
      source: "customer",
      pattern: "\\b(running|hiking|waterproof|warm|lightweight|casual|travel|packable|outerwear|footwear)\\b",
    },
  },
  execute: async (_context, args): Promise<ToolResult> => {
    const products = rankProducts(args.preference);
    return {
      data: products.map(p => ({ sku: p.sku, name: p.name, price: p.price, internal: { costBasis: p.costBasis } })),
      cannedFields: products.length > 0 ? { product_name: products[0].name } : {},
    };
  },
});

export const checkAvailabilityTool = defineTool({
  name: "check_availability",
  description: "Find an in-store appointment slot for a service on a date",
  inputSchema: z.object({
    service: z.string(),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  }),
  parameters: {
    service: { source: "customer", fromFact: "service" },
    date: { source: "customer", fromFact: "date" },
  },
  maxRetries: 1,
  retryable: true,
  execute: async (_context, args) => {
    if (!data.services.includes(args.service.toLowerCase())) {
      return { error: `We do not offer ${args.service} in store`, control: { retryAllowed: false } };
    }
    // Stores are closed on Sundays; offer the Monday instead
    const day = new Date(`${args.date}T00:00:00Z`);
    if (day.getUTCDay() === 0) day.setUTCDate(day.getUTCDate() + 1);
    const slot = `${day.toISOString().slice(0, 10)} 10:00`;
    return {
      data: { service: args.service, slot },
      cannedFields: { service: args.service, slot },
    };
  },
});

// Refresher for the loyalty_tier context variable
export const getLoyaltyTierTool = defineTool({
  name: "get_loyalty_tier",
  description: "Read the customer's loyalty tier",
  inputSchema: z.object({}),
  execute: async context => {
    const tier = data.loyalty[context.customerId] ?? "standard";
    return { data: tier, variables: { loyalty_tier: tier } };
  },
});

export const retailTools = [
  lookupOrderTool,
  processReturnTool,
  recommendProductsTool,
  checkAvailabilityTool,
  getLoyaltyTierTool,
];
