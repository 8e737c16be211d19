import { fileURLToPath } from 'url';
import * as protoLoader from '@grpc/proto-loader';
import type { PackageDefinition, ServiceDefinition } from '@grpc/proto-loader';

export const USER_SERVICE_NAME = 'user.v1.UserService';

// Same relative location from src/ and from dist/
export const USER_PROTO_PATH = fileURLToPath(
  new URL('../../../proto/user/v1/user.proto', import.meta.url)
);

type Definition = PackageDefinition[string];

function isServiceDefinition(definition: Definition): definition is ServiceDefinition {
  // Message and enum definitions carry a `format`; services are plain method maps
  return !('format' in definition);
}

/**
 * Load the user proto at run time. Fields are camelCased, enums decode to
 * their names, and unset fields stay undefined so proto3 `optional`
 * presence survives decoding.
 */
export function loadUserProto(protoPath: string = USER_PROTO_PATH): PackageDefinition {
  return protoLoader.loadSync(protoPath, {
    keepCase: false,
    longs: String,
    enums: String,
    defaults: false,
    oneofs: true,
  });
}

export function userServiceDefinition(packageDefinition: PackageDefinition): ServiceDefinition {
  const definition = packageDefinition[USER_SERVICE_NAME];
  if (definition === undefined || !isServiceDefinition(definition)) {
    throw new Error(`${USER_SERVICE_NAME} is missing from the proto definition`);
  }
  return definition;
}
