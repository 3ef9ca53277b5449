import { z } from 'zod';
import type { InventoryController } from '../controllers/inventory.controller';
import { ValidationError } from '../lib/errors';
import { resolveFormat } from '../inventory/report';
import type { ReportFormat } from '../types/report';

export type OperationCategory = 'compute' | 'image' | 'storage' | 'network' | 'analysis' | 'monitoring' | 'reporting';

export type JsonSchemaProperty = {
  type: 'string' | 'number' | 'boolean';
  description: string;
  enum?: string[];
  default?: string;
};

export type InputSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

export type OperationDescriptor = {
  name: string;
  description: string;
  category: OperationCategory;
  inputSchema: InputSchema;
};

export type Operation = OperationDescriptor & {
  /** Validate `args`, then run against the controller. Throws ValidationError before any I/O. */
  invoke(inventory: InventoryController, args: unknown): Promise<unknown>;
};

type OperationDefinition<S extends z.ZodTypeAny> = OperationDescriptor & {
  args: S;
  run: (inventory: InventoryController, args: z.infer<S>) => Promise<unknown>;
};

const requiredId = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`);

const noArgs = z.object({});
const serverArgs = z.object({ server_id: requiredId('server_id') });
const flavorArgs = z.object({ flavor_id: requiredId('flavor_id') });
const imageArgs = z.object({ image_id: requiredId('image_id') });
const reportArgs = z.object({
  format: z
    .unknown()
    .transform((value): ReportFormat => (value === undefined ? 'detailed' : resolveFormat(value))),
});

const NO_INPUT: InputSchema = { type: 'object', properties: {}, required: [] };

const idInput = (field: string, description: string): InputSchema => ({
  type: 'object',
  properties: { [field]: { type: 'string', description } },
  required: [field],
});

function defineOperation<S extends z.ZodTypeAny>(def: OperationDefinition<S>): Operation {
  const { args, run, ...descriptor } = def;
  return {
    ...descriptor,
    async invoke(inventory, raw) {
      if (raw !== undefined && raw !== null && (typeof raw !== 'object' || Array.isArray(raw))) {
        throw new ValidationError(`${def.name}: arguments must be an object`);
      }
      const parsed = args.safeParse(raw ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ValidationError(issue ? issue.message : `${def.name}: invalid arguments`, {
          operation: def.name,
          path: issue?.path.join('.'),
        });
      }
      return run(inventory, parsed.data);
    },
  };
}

export const OPERATIONS: readonly Operation[] = [
  defineOperation({
    name: 'list_servers',
    description: 'List every server with its status, placement, flavor, image and addresses.',
    category: 'compute',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('servers'),
  }),
  defineOperation({
    name: 'get_server_details',
    description: 'Fetch one server by id, including power and task state, fault and metadata.',
    category: 'compute',
    inputSchema: idInput('server_id', 'Server UUID'),
    args: serverArgs,
    run: (inv, { server_id }) => inv.getServerDetails(server_id),
  }),
  defineOperation({
    name: 'list_hypervisors',
    description: 'List hypervisor hosts with vCPU, memory and local disk capacity and usage.',
    category: 'compute',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('hypervisors'),
  }),
  defineOperation({
    name: 'list_flavors',
    description: 'List compute flavors and the resources each one grants.',
    category: 'compute',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('flavors'),
  }),
  defineOperation({
    name: 'get_flavor_details',
    description: 'Fetch one flavor by id together with its extra specs.',
    category: 'compute',
    inputSchema: idInput('flavor_id', 'Flavor id'),
    args: flavorArgs,
    run: (inv, { flavor_id }) => inv.getFlavorDetails(flavor_id),
  }),
  defineOperation({
    name: 'list_images',
    description: 'List images with status, size and minimum disk and RAM requirements.',
    category: 'image',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('images'),
  }),
  defineOperation({
    name: 'get_image_details',
    description: 'Fetch one image by id including its metadata.',
    category: 'image',
    inputSchema: idInput('image_id', 'Image UUID'),
    args: imageArgs,
    run: (inv, { image_id }) => inv.getImageDetails(image_id),
  }),
  defineOperation({
    name: 'list_volumes',
    description: 'List block storage volumes with status, size and attachments.',
    category: 'storage',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('volumes'),
  }),
  defineOperation({
    name: 'list_volume_types',
    description: 'List volume types and their extra specs.',
    category: 'storage',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('volume_types'),
  }),
  defineOperation({
    name: 'list_networks',
    description: 'List networks with provider type, sharing and external flags.',
    category: 'network',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('networks'),
  }),
  defineOperation({
    name: 'list_subnets',
    description: 'List subnets with CIDR, gateway, allocation pools and DHCP setting.',
    category: 'network',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('subnets'),
  }),
  defineOperation({
    name: 'list_routers',
    description: 'List routers with status and external gateway.',
    category: 'network',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.list('routers'),
  }),
  defineOperation({
    name: 'analyze_server_resources',
    description: 'Combine a server with its flavor allocation and host hypervisor load, and classify its health.',
    category: 'analysis',
    inputSchema: idInput('server_id', 'Server UUID'),
    args: serverArgs,
    run: (inv, { server_id }) => inv.analyzeServerResources(server_id),
  }),
  defineOperation({
    name: 'get_infrastructure_summary',
    description: 'Counts and capacity across servers, hypervisors, volumes and networks.',
    category: 'analysis',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.getInfrastructureSummary(),
  }),
  defineOperation({
    name: 'get_resource_utilization',
    description: 'Per-hypervisor CPU, memory and disk utilization with high-load hosts flagged.',
    category: 'monitoring',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.getResourceUtilization(),
  }),
  defineOperation({
    name: 'check_service_health',
    description: 'Probe compute, block storage and networking and roll the results up into an overall status.',
    category: 'monitoring',
    inputSchema: NO_INPUT,
    args: noArgs,
    run: (inv) => inv.checkServiceHealth(),
  }),
  defineOperation({
    name: 'generate_inventory_report',
    description:
      'Full inventory across compute, storage and networking with utilization and prioritized recommendations.',
    category: 'reporting',
    inputSchema: {
      type: 'object',
      properties: {
        format: {
          type: 'string',
          description: 'summary omits per-resource detail lists',
          enum: ['summary', 'detailed'],
          default: 'detailed',
        },
      },
      required: [],
    },
    args: reportArgs,
    run: (inv, { format }) => inv.generateInventoryReport(format),
  }),
];

const BY_NAME = new Map(OPERATIONS.map((op) => [op.name, op]));

export function findOperation(name: string): Operation | undefined {
  return BY_NAME.get(name);
}

export function getOperation(name: string): Operation {
  const op = findOperation(name);
  if (!op) {
    throw new ValidationError(`Unknown operation '${name}'`, { operation: name });
  }
  return op;
}

export function describeOperations(): OperationDescriptor[] {
  return OPERATIONS.map(({ name, description, category, inputSchema }) => ({
    name,
    description,
    category,
    inputSchema,
  }));
}
