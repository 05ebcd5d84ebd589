import { describe, expect, it } from "vitest";
import { allocate } from "./allocate.js";
import { buildInterfaces } from "./interfaces.js";
import { buildTopology } from "./topology.js";
import type { TopologyDescription } from "./util.js";

const fabric: TopologyDescription = {
  name: "fabric",
  nodes: [{ name: "leaf-1" }, { name: "leaf-2" }, { name: "spine-1" }],
  links: [
    { endpoints: [{ node: "leaf-1", interface: "eth1" }, { node: "spine-1", interface: "eth1" }] },
    { endpoints: [{ node: "spine-1", interface: "eth2" }, { node: "leaf-2", interface: "eth1" }] },
  ],
};

describe("buildInterfaces", () => {
  it("fills local and neighbor addresses from the link subnet", () => {
    const t = buildTopology(fabric);
    const ifs = buildInterfaces(t, allocate(t));
    expect(ifs.get("leaf-1")).toEqual({
      eth1: {
        local_ip4: "198.51.100.0",
        local_ip6: "2001:db8::",
        subnet4: "198.51.100.0/31",
        subnet6: "2001:db8::/127",
        neighbor_name: "spine-1",
        neighbor_ip4: "198.51.100.1",
        neighbor_ip6: "2001:db8::1",
      },
    });
    expect(ifs.get("spine-1")).toEqual({
      eth1: {
        local_ip4: "198.51.100.1",
        local_ip6: "2001:db8::1",
        subnet4: "198.51.100.0/31",
        subnet6: "2001:db8::/127",
        neighbor_name: "leaf-1",
        neighbor_ip4: "198.51.100.0",
        neighbor_ip6: "2001:db8::",
      },
      eth2: {
        local_ip4: "198.51.100.3",
        local_ip6: "2001:db8::3",
        subnet4: "198.51.100.2/31",
        subnet6: "2001:db8::2/127",
        neighbor_name: "leaf-2",
        neighbor_ip4: "198.51.100.2",
        neighbor_ip6: "2001:db8::2",
      },
    });
  });

  it("is symmetric across every link", () => {
    const t = buildTopology(fabric);
    const ifs = buildInterfaces(t, allocate(t));
    for (const [node, record] of ifs) {
      for (const vars of Object.values(record)) {
        const back = Object.values(ifs.get(vars.neighbor_name) ?? {}).find((v) => v.neighbor_name === node);
        expect(back?.local_ip4).toBe(vars.neighbor_ip4);
        expect(back?.neighbor_ip6).toBe(vars.local_ip6);
        expect(back?.subnet4).toBe(vars.subnet4);
      }
    }
  });

  it("synthesizes free ethN names for endpoints without one", () => {
    const t = buildTopology({
      name: "t",
      nodes: [{ name: "a-1" }, { name: "b-1" }, { name: "c-1" }],
      links: [
        { endpoints: [{ node: "a-1", interface: "eth1" }, { node: "b-1" }] },
        { endpoints: [{ node: "a-1" }, { node: "c-1" }] },
      ],
    });
    const ifs = buildInterfaces(t, allocate(t));
    expect(Object.keys(ifs.get("a-1") ?? {})).toEqual(["eth1", "eth2"]);
    expect(ifs.get("a-1")?.eth2?.neighbor_name).toBe("c-1");
    expect(Object.keys(ifs.get("b-1") ?? {})).toEqual(["eth1"]);
    expect(Object.keys(ifs.get("c-1") ?? {})).toEqual(["eth1"]);
  });

  it("keeps interface names that clash with Object.prototype keys", () => {
    const t = buildTopology({
      name: "t",
      nodes: [{ name: "a-1" }, { name: "b-1" }],
      links: [{ endpoints: [{ node: "a-1", interface: "__proto__" }, { node: "b-1", interface: "constructor" }] }],
    });
    const ifs = buildInterfaces(t, allocate(t));
    expect(Object.keys(ifs.get("a-1") ?? {})).toEqual(["__proto__"]);
    expect(ifs.get("a-1")?.["__proto__"]?.neighbor_name).toBe("b-1");
    expect(Object.keys(ifs.get("b-1") ?? {})).toEqual(["constructor"]);
    expect(ifs.get("b-1")?.["constructor"]?.local_ip4).toBe("198.51.100.1");
  });

  it("gives isolated nodes an empty record and others one per link", () => {
    const t = buildTopology({
      name: "t",
      nodes: [{ name: "leaf-1" }, { name: "spine-1" }, { name: "spine-2" }, { name: "mgmt-1" }],
      links: [
        { endpoints: [{ node: "leaf-1" }, { node: "spine-1" }] },
        { endpoints: [{ node: "leaf-1" }, { node: "spine-2" }] },
      ],
    });
    const ifs = buildInterfaces(t, allocate(t));
    expect(Object.keys(ifs.get("leaf-1") ?? {})).toHaveLength(2);
    expect(ifs.get("mgmt-1")).toEqual({});
  });
});
