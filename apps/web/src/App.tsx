import type { Plan } from "@packwise/shared";
import { useEffect, useState, type FormEvent } from "react";
import { PlanTable } from "./components/PlanTable";
import { ApiError, getPackSizes, optimizeOrder, updatePackSizes } from "./lib/api";
import {
  formatPackSizes,
  parseItemsOrdered,
  parsePackSizes,
  readItemsOrderedParam,
  withItemsOrderedParam
} from "./lib/packSizes";

function formatErrorMessage(err: unknown) {
  if (err instanceof ApiError) {
    return `${err.message} (Request ID: ${err.requestId ?? "unknown"})`;
  }
  return err instanceof Error ? err.message : String(err);
}

export default function App() {
  // Pack sizes
  const [packSizesInput, setPackSizesInput] = useState("");
  const [savedSizes, setSavedSizes] = useState<number[]>([]);
  const [sizesStatus, setSizesStatus] = useState<string>("");

  // Order
  const [itemsInput, setItemsInput] = useState("");
  const [plan, setPlan] = useState<Plan | null>(null);
  const [orderStatus, setOrderStatus] = useState<string>("");

  async function runOptimization(itemsOrdered: number) {
    setOrderStatus("Calculating...");
    setPlan(null);
    try {
      const res = await optimizeOrder({ items_ordered: itemsOrdered });
      setPlan(res);
      setOrderStatus("");
      window.history.replaceState({}, "", withItemsOrderedParam(window.location.pathname, window.location.search, itemsOrdered));
    } catch (err) {
      setOrderStatus(formatErrorMessage(err));
    }
  }

  useEffect(() => {
    async function init() {
      try {
        const res = await getPackSizes();
        setSavedSizes(res.pack_sizes);
        setPackSizesInput(formatPackSizes(res.pack_sizes));
      } catch (err) {
        setSizesStatus(formatErrorMessage(err));
      }

      const fromQuery = readItemsOrderedParam(window.location.search);
      if (fromQuery === null) return;

      const itemsOrdered = parseItemsOrdered(fromQuery);
      if (itemsOrdered === null) {
        setOrderStatus("Invalid items_ordered query param. It must be a positive integer.");
        return;
      }
      setItemsInput(String(itemsOrdered));
      await runOptimization(itemsOrdered);
    }

    void init();
  }, []);

  async function onSavePackSizes(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    setSizesStatus("");
    try {
      const res = await updatePackSizes({ pack_sizes: parsePackSizes(packSizesInput) });
      setSavedSizes(res.pack_sizes);
      setPackSizesInput(formatPackSizes(res.pack_sizes));
      setSizesStatus("Saved.");
    } catch (err) {
      setSizesStatus(formatErrorMessage(err));
    }
  }

  async function onOptimize(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    const itemsOrdered = parseItemsOrdered(itemsInput);
    if (itemsOrdered === null) {
      setOrderStatus("items_ordered must be a positive integer.");
      return;
    }
    await runOptimization(itemsOrdered);
  }

  return (
    <main style={{ fontFamily: "system-ui, sans-serif", maxWidth: 640, margin: "32px auto", padding: "0 16px" }}>
      <h1>Packwise</h1>

      <form onSubmit={onSavePackSizes} style={{ marginBottom: 24 }}>
        <label htmlFor="pack-sizes" style={{ display: "block", fontWeight: 600 }}>
          Pack sizes
        </label>
        <input
          id="pack-sizes"
          value={packSizesInput}
          onChange={(e) => setPackSizesInput(e.target.value)}
          placeholder="250, 500, 1000"
          style={{ width: "70%", marginRight: 8 }}
        />
        <button type="submit">Save</button>
        {savedSizes.length > 0 && (
          <p style={{ fontSize: 12, color: "#555" }}>In use: {formatPackSizes(savedSizes)}</p>
        )}
        {sizesStatus && <p role="status">{sizesStatus}</p>}
      </form>

      <form onSubmit={onOptimize}>
        <label htmlFor="items-ordered" style={{ display: "block", fontWeight: 600 }}>
          Items ordered
        </label>
        <input
          id="items-ordered"
          inputMode="numeric"
          value={itemsInput}
          onChange={(e) => setItemsInput(e.target.value)}
          style={{ width: "70%", marginRight: 8 }}
        />
        <button type="submit">Calculate</button>
        {orderStatus && <p role="alert">{orderStatus}</p>}
      </form>

      {plan && <PlanTable plan={plan} />}
    </main>
  );
}
