import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { err, ok } from "neverthrow";
import { z } from "zod";
import {
  JsonValueSchema,
  notFoundError,
  type ProviderRegistry,
  type ResourceProvider,
} from "../../src/index.js";

const CloudSchema = z.record(
  z.string(),
  z.object({ type: z.string(), attributes: z.record(z.string(), JsonValueSchema) }),
);

type Cloud = z.infer<typeof CloudSchema>;

// A pretend cloud kept in a JSON file next to this module, so objects outlive the process.
const CLOUD_FILE = fileURLToPath(new URL("./.cloud.json", import.meta.url));

const readCloud = async (): Promise<Cloud> => {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(CLOUD_FILE, "utf-8"));
    return CloudSchema.parse(parsed);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return {};
    }
    throw e;
  }
};

const writeCloud = (cloud: Cloud): Promise<void> =>
  fs.writeFile(CLOUD_FILE, JSON.stringify(cloud, null, 2));

// Calls run concurrently; each read-modify-write of the file takes its turn.
let turn: Promise<unknown> = Promise.resolve();
const exclusive = <T>(work: () => Promise<T>): Promise<T> => {
  const next = turn.then(work);
  turn = next.catch(() => undefined);
  return next;
};

const simulated = (type: string, prefix: string): ResourceProvider => ({
  create: (attributes) =>
    exclusive(async () => {
      const cloud = await readCloud();
      const id = `${prefix}-${randomUUID().slice(0, 8)}`;
      const stored = { ...attributes, arn: `arn:example:${type}/${id}` };
      await writeCloud({ ...cloud, [id]: { type, attributes: stored } });
      return ok({ id, attributes: stored });
    }),
  read: (id) =>
    exclusive(async () => {
      const object = (await readCloud())[id];
      return object === undefined ? err(notFoundError(`${id} not found`)) : ok(object.attributes);
    }),
  update: (id, attributes) =>
    exclusive(async () => {
      const cloud = await readCloud();
      const object = cloud[id];
      if (object === undefined) {
        return err(notFoundError(`${id} not found`));
      }
      const stored = { ...object.attributes, ...attributes };
      await writeCloud({ ...cloud, [id]: { type, attributes: stored } });
      return ok(stored);
    }),
  delete: (id) =>
    exclusive(async () => {
      const { [id]: removed, ...rest } = await readCloud();
      if (removed === undefined) {
        return err(notFoundError(`${id} not found`));
      }
      await writeCloud(rest);
      return ok(undefined);
    }),
});

export const providers: ProviderRegistry = {
  net_vpc: simulated("net_vpc", "vpc"),
  net_subnet: simulated("net_subnet", "subnet"),
  net_security_group: simulated("net_security_group", "sg"),
  compute_instance: simulated("compute_instance", "i"),
  net_load_balancer: simulated("net_load_balancer", "lb"),
  storage_bucket: simulated("storage_bucket", "bucket"),
};

export default providers;
