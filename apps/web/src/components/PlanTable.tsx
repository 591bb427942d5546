import type { Plan } from "@packwise/shared";
import { formatPlanSummary } from "../lib/packSizes";

export function PlanTable(props: { plan: Plan }) {
  return (
    <section aria-label="Packing plan" style={{ marginTop: 24 }}>
      <p>{formatPlanSummary(props.plan)}</p>
      <table style={{ borderCollapse: "collapse", minWidth: 240 }}>
        <thead>
          <tr>
            <th style={{ textAlign: "left", borderBottom: "1px solid #ddd", padding: 4 }}>Pack size</th>
            <th style={{ textAlign: "right", borderBottom: "1px solid #ddd", padding: 4 }}>Count</th>
          </tr>
        </thead>
        <tbody>
          {props.plan.packs.map((pack) => (
            <tr key={pack.size}>
              <td style={{ padding: 4 }}>{pack.size}</td>
              <td style={{ padding: 4, textAlign: "right" }}>{pack.count}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </section>
  );
}
