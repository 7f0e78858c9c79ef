import type { EggDescriptor, EggDescriptorJson } from '../types/index.js';

/**
 * Canonical snake_case JSON form of a descriptor. `parseEgg` reads it back
 * into an equivalent descriptor.
 */
export function descriptorToJson(descriptor: EggDescriptor): EggDescriptorJson {
  return {
    name: descriptor.name ?? null,
    description: descriptor.description ?? null,
    startup: descriptor.startup ?? null,
    docker_images: Object.fromEntries(descriptor.dockerImages),
    variables: descriptor.variables.map((variable) => ({
      name: variable.name,
      env_variable: variable.envVariable ?? null,
      description: variable.description ?? null,
      default_value: variable.defaultValue ?? null,
      required: variable.required,
    })),
    ports: [...descriptor.ports],
    install_script: descriptor.installScript ?? null,
    install_image: descriptor.installImage ?? null,
    install_entrypoint: descriptor.installEntrypoint ?? null,
  };
}
