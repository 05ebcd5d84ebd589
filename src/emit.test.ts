import { describe, expect, it } from "vitest";
import { containerName, hostJson, listJson, renderHost, renderList } from "./emit.js";
import { buildInventory } from "./inventory.js";
import { defaultKinds, kindResolver } from "./kinds.js";
import type { TopologyDescription } from "./util.js";

const lab: TopologyDescription = {
  name: "fabric",
  nodes: [
    { name: "leaf-1", kind: "ceos" },
    { name: "spine-1", kind: "ceos" },
    { name: "srv-1", kind: "linux" },
    { name: "srv-2", kind: "ceos" },
  ],
  links: [{ endpoints: [{ node: "leaf-1", interface: "eth1" }, { node: "spine-1", interface: "eth1" }] }],
};

const kinds = kindResolver(defaultKinds, () => undefined);

describe("containerName", () => {
  it("follows the containerlab prefix rules", () => {
    expect(containerName("fabric", undefined, "leaf-1")).toBe("clab-fabric-leaf-1");
    expect(containerName("fabric", "", "leaf-1")).toBe("leaf-1");
    expect(containerName("fabric", " dc1 ", "leaf-1")).toBe("dc1-fabric-leaf-1");
  });
});

describe("renderList", () => {
  it("puts shared kind variables on the group", () => {
    const doc = renderList(buildInventory(lab), { kinds });
    expect(doc.children).toEqual(["leaf", "spine", "srv"]);
    expect(doc.groups.leaf).toEqual({ hosts: ["leaf-1"], vars: defaultKinds.ceos });
    expect(doc.hostvars["leaf-1"]?.ansible_host).toBe("clab-fabric-leaf-1");
    expect(doc.hostvars["leaf-1"]?.ansible_network_os).toBeUndefined();
  });

  it("puts kind variables on hosts when a group mixes kinds", () => {
    const doc = renderList(buildInventory(lab), { kinds });
    expect(doc.groups.srv).toEqual({ hosts: ["srv-1", "srv-2"], vars: {} });
    expect(doc.hostvars["srv-1"]?.ansible_network_os).toBeUndefined();
    expect(doc.hostvars["srv-2"]?.ansible_network_os).toBe("arista.eos.eos");
    expect(doc.hostvars["srv-2"]?.loopback4).toBe("192.0.2.4");
  });
});

describe("listJson", () => {
  it("lays out the dynamic inventory document", () => {
    const parsed: Record<string, unknown> = JSON.parse(listJson(renderList(buildInventory(lab), { kinds })));
    expect(Object.keys(parsed)).toEqual(["all", "leaf", "spine", "srv", "_meta"]);
    expect(parsed).toMatchObject({
      all: { children: ["leaf", "spine", "srv"] },
      _meta: { hostvars: { "spine-1": { clns_net: "49.0001.1920.0000.2002.00" } } },
    });
  });

  it("indents with four spaces", () => {
    expect(listJson({ children: [], groups: {}, hostvars: {} })).toBe(
      '{\n    "all": {\n        "children": []\n    },\n    "_meta": {\n        "hostvars": {}\n    }\n}',
    );
  });
});

describe("listJson with prototype-named groups", () => {
  it("emits the group and its host", () => {
    const model = buildInventory({ name: "t", nodes: [{ name: "__proto__-1" }, { name: "leaf-1" }], links: [] });
    const parsed: Record<string, unknown> = JSON.parse(listJson(renderList(model, { kinds })));
    expect(Object.keys(parsed)).toEqual(["all", "__proto__", "leaf", "_meta"]);
    expect(Object.prototype.hasOwnProperty.call(parsed, "__proto__")).toBe(true);
    expect(parsed.all).toEqual({ children: ["__proto__", "leaf"] });
  });
});

describe("renderHost", () => {
  it("returns one host's variables or nothing", () => {
    const doc = renderList(buildInventory(lab), { kinds });
    expect(renderHost(doc, "spine-1")).toMatchObject({ ansible_host: "clab-fabric-spine-1", loopback4: "192.0.2.2" });
    expect(renderHost(doc, "nope-1")).toEqual({});
    expect(hostJson(doc, "nope-1")).toBe("{}");
  });
});
