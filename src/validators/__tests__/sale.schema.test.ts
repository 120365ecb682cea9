import { checkoutRequestSchema, saleRequestSchema } from "../sale.schema";

describe("saleRequestSchema", () => {
  it("applies the request defaults", () => {
    expect(saleRequestSchema.parse({ product_id: "P1" })).toEqual({
      user_id: "",
      reseller_id: "",
      product_id: "P1",
      qty: 1,
      customer_id: "C-000",
      payment_method: "cash",
    });
  });

  it("normalises numeric ids and quantities", () => {
    const parsed = saleRequestSchema.parse({ short_id: 42, qty: "3", reseller_id: 7 });
    expect(parsed.short_id).toBe("42");
    expect(parsed.reseller_id).toBe("7");
    expect(parsed.qty).toBe(3);
  });

  it("treats blank product keys as absent", () => {
    const parsed = saleRequestSchema.parse({ product_id: "", short_id: null });
    expect(parsed.product_id).toBeUndefined();
    expect(parsed.short_id).toBeUndefined();
  });

  it("falls back to a quantity of 1 for unreadable values", () => {
    expect(saleRequestSchema.parse({ product_id: "P1", qty: "a few" }).qty).toBe(1);
  });
});

describe("checkoutRequestSchema", () => {
  it("requires at least one item", () => {
    const result = checkoutRequestSchema.safeParse({ items: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("No items");
    }
  });

  it("rejects a non-list of items", () => {
    expect(checkoutRequestSchema.safeParse({ items: "P1" }).success).toBe(false);
  });

  it("parses items with defaults", () => {
    const parsed = checkoutRequestSchema.parse({ items: [{ product_id: "P1" }, { short_id: "S2", qty: 2 }] });
    expect(parsed.items).toEqual([
      { product_id: "P1", qty: 1 },
      { short_id: "S2", qty: 2 },
    ]);
    expect(parsed.customer_id).toBe("C-000");
  });
});
