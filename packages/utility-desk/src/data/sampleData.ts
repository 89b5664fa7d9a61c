import sampleEnterprises from "./sampleEnterprises.json";
import type { Enterprise } from "../types";

/** Fresh copies of the demonstration enterprises. */
export function createSampleEnterprises(): Enterprise[] {
  return sampleEnterprises.map((enterprise) => ({ ...enterprise }));
}
