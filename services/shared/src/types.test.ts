import { describe, it, expect } from "vitest";
import type { DatasetGroup, Service, ServiceResult, WmsService } from "./types.js";

describe("shared types", () => {
  it("Service union narrows on protocol", () => {
    const wms: WmsService = {
      title: "Example",
      abstract: "",
      metadataId: "md-1",
      datasetMetadataId: "ds-1",
      url: "https://example.com/wms?request=GetCapabilities&service=WMS",
      keywords: [],
      protocol: "OGC:WMS",
      imgformats: "image/png",
      layers: [],
    };
    const results: ServiceResult[] = [
      wms,
      { failed: true, url: "https://example.com/wfs", metadataId: "md-2", protocol: "OGC:WFS" },
    ];
    const services = results.filter((r): r is Service => !("failed" in r));
    expect(services).toHaveLength(1);
    expect(services[0].protocol).toBe("OGC:WMS");
  });

  it("DatasetGroup services drop datasetMetadataId", () => {
    const { datasetMetadataId: _dropped, ...nested } = {
      title: "Example",
      abstract: "",
      metadataId: "md-1",
      datasetMetadataId: "ds-1",
      url: "https://example.com/wcs",
      keywords: [],
      protocol: "OGC:WCS" as const,
      coverages: [],
    };
    const group: DatasetGroup = { title: "Dataset", abstract: "", metadataId: "ds-1", services: [nested] };
    expect("datasetMetadataId" in group.services[0]).toBe(false);
  });
});
