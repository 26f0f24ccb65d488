import { z } from 'zod';

const headersSchema = z.record(
  z.string().min(1),
  z.union([z.string(), z.number()]).transform(String)
);

const pageSchema = z.strictObject({
  status: z.number().int().min(100).max(599),
  page: z.string().min(1),
});

const routeSchema = z.strictObject({
  location: z.string().min(1),
  root: z.string().min(1).optional(),
  index: z.array(z.string().min(1)).optional(),
  auto_index: z.boolean().optional(),
  error_page: pageSchema.optional(),
  not_found_page: pageSchema.optional(),
  proxy_pass: z.string().min(1).optional(),
  upstream: z.string().min(1).optional(),
  proxy_timeout: z.number().int().positive().optional(),
  forward_proxy: z.boolean().optional(),
  redirect_to: z.string().min(1).optional(),
  redirect_code: z.number().int().min(300).max(399).optional(),
  script: z.string().min(1).optional(),
  lua_script: z.string().min(1).optional(),
  headers: headersSchema.optional(),
  max_body_size: z.number().int().positive().optional(),
});

const hostSchema = z.strictObject({
  ip: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(1).max(65535),
  ssl: z.boolean().default(false),
  certificate: z.string().min(1).optional(),
  certificate_key: z.string().min(1).optional(),
  timeout: z.number().int().positive().default(75),
  keepalive_timeout: z.number().int().nonnegative().default(5),
  server_name: z.string().min(1).optional(),
  headers: headersSchema.optional(),
  route: z.array(routeSchema).default([]),
});

const upstreamServerSchema = z.strictObject({
  server: z.string().min(1),
  weight: z.number().int().min(1).default(1),
});

const upstreamSchema = z.strictObject({
  name: z.string().min(1),
  method: z
    .enum(['roundrobin', 'weightedroundrobin', 'iphash', 'leastconn'])
    .default('weightedroundrobin'),
  server: z.array(upstreamServerSchema),
});

export const gatewayFileSchema = z.strictObject({
  log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  default_type: z.string().min(1).default('application/octet-stream'),
  types: z.record(z.string().min(1), z.string().min(1)).default({}),
  upstream: z.array(upstreamSchema).default([]),
  host: z.array(hostSchema).default([]),
});

export type GatewayFile = z.infer<typeof gatewayFileSchema>;
export type HostFile = z.infer<typeof hostSchema>;
export type RouteFile = z.infer<typeof routeSchema>;
export type UpstreamFile = z.infer<typeof upstreamSchema>;
