import { ErrorCode } from '@/lib/errors/error-codes';
import { protocolError, validationError } from '@/lib/errors/error';

import { ATTRIBUTES_KEY, TEXT_KEY, asArray, asObject, asText } from './transcode';

import type { TraversalSpec } from './requests';
import type { SessionManager } from './session';
import type { SoapCallOutcome } from './soap';
import type { CardinalitySchema } from './transcode';
import type { PropertySet, StructuredValue } from './types';

// Walks folders, datacenters, compute resources, resource pools and hosts down to every managed object.
export const INVENTORY_TRAVERSAL: readonly TraversalSpec[] = [
  {
    name: 'visitFolders',
    type: 'Folder',
    path: 'childEntity',
    skip: false,
    selectSet: [
      'visitFolders',
      'datacenterToVmFolder',
      'datacenterToHostFolder',
      'datacenterToDatastoreFolder',
      'datacenterToNetworkFolder',
      'computeResourceToHost',
      'computeResourceToResourcePool',
      'resourcePoolToResourcePool',
      'resourcePoolToVm',
      'hostToVm',
    ],
  },
  { name: 'datacenterToVmFolder', type: 'Datacenter', path: 'vmFolder', skip: false, selectSet: ['visitFolders'] },
  { name: 'datacenterToHostFolder', type: 'Datacenter', path: 'hostFolder', skip: false, selectSet: ['visitFolders'] },
  {
    name: 'datacenterToDatastoreFolder',
    type: 'Datacenter',
    path: 'datastoreFolder',
    skip: false,
    selectSet: ['visitFolders'],
  },
  {
    name: 'datacenterToNetworkFolder',
    type: 'Datacenter',
    path: 'networkFolder',
    skip: false,
    selectSet: ['visitFolders'],
  },
  { name: 'computeResourceToHost', type: 'ComputeResource', path: 'host', skip: false, selectSet: [] },
  {
    name: 'computeResourceToResourcePool',
    type: 'ComputeResource',
    path: 'resourcePool',
    skip: false,
    selectSet: ['resourcePoolToResourcePool', 'resourcePoolToVm'],
  },
  {
    name: 'resourcePoolToResourcePool',
    type: 'ResourcePool',
    path: 'resourcePool',
    skip: false,
    selectSet: ['resourcePoolToResourcePool', 'resourcePoolToVm'],
  },
  { name: 'resourcePoolToVm', type: 'ResourcePool', path: 'vm', skip: false, selectSet: [] },
  { name: 'hostToVm', type: 'HostSystem', path: 'vm', skip: false, selectSet: ['visitFolders'] },
];

export type InventoryOptions = {
  signal?: AbortSignal;
  /** Property value fields to keep as lists, e.g. repeated children of a `val`. */
  arrays?: CardinalitySchema;
};

export type InventoryResult = {
  propertySets: PropertySet[];
  call: SoapCallOutcome;
};

function readPropertySets(value: StructuredValue, objectType: string): PropertySet[] {
  const items = asArray(asObject(value)?.returnval);
  return items.map((item, index) => {
    const content = asObject(item);
    const obj = content?.obj;
    const ref = asObject(obj);
    const id = (ref ? asText(ref[TEXT_KEY]) : asText(obj))?.trim();
    // Supertype queries (ComputeResource, ManagedEntity) return subtypes; the reply names each one.
    const kind = asText(asObject(ref?.[ATTRIBUTES_KEY])?.type)?.trim() || objectType;
    if (!content || !id) {
      throw protocolError({
        code: ErrorCode.SOAP_UNEXPECTED_RESPONSE,
        message: `object content ${index} has no obj reference`,
      });
    }

    const properties: Record<string, StructuredValue> = {};
    for (const entry of asArray(content.propSet)) {
      const prop = asObject(entry);
      const name = asText(prop?.name);
      if (!prop || !name) continue;
      properties[name] = prop.val ?? '';
    }
    return { obj: { kind, id }, properties };
  });
}

/**
 * Lists every object of `objectType` reachable from the root folder with the requested properties.
 * Values are passed through as transcoded, without interpretation.
 */
export async function retrieveInventory(
  session: SessionManager,
  objectType: string,
  propertyPaths: readonly string[],
  includeAll: boolean,
  options: InventoryOptions = {},
): Promise<InventoryResult> {
  if (typeof objectType !== 'string' || !objectType.trim()) {
    throw validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: 'objectType is required',
      details: [{ field: 'objectType', issue: 'empty' }],
    });
  }
  if (!Array.isArray(propertyPaths)) {
    throw validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: 'propertyPaths must be a list',
      details: [{ field: 'propertyPaths', issue: 'not_array' }],
    });
  }

  const refs = session.requireAuthenticated();
  const call = await session.call(
    'RetrieveProperties',
    {
      propertyCollector: refs.propertyCollector,
      rootFolder: refs.rootFolder,
      objectType: objectType.trim(),
      all: includeAll,
      pathSet: propertyPaths,
      traversal: INVENTORY_TRAVERSAL,
    },
    { signal: options.signal, arrays: options.arrays, leafAttributes: ['obj'] },
  );

  return { propertySets: readPropertySets(call.value, objectType.trim()), call };
}
