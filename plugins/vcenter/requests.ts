import { XMLBuilder } from 'fast-xml-parser';

import type { CardinalitySchema } from './transcode';
import type { MetricId, ObjectRef, PerfFormat } from './types';

export const SOAP_ENVELOPE_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
export const VIM25_NS = 'urn:vim25';
export const XSI_NS = 'http://www.w3.org/2001/XMLSchema-instance';

export type TraversalSpec = {
  name: string;
  type: string;
  path: string;
  skip: boolean;
  /** Names of other specs to continue with; back references are how recursion is expressed. */
  selectSet: readonly string[];
};

export type RequestParams = {
  RetrieveServiceContent: Record<string, never>;
  Login: {
    sessionManager: ObjectRef;
    userName: string;
    password: string;
  };
  RetrieveProperties: {
    propertyCollector: ObjectRef;
    rootFolder: ObjectRef;
    objectType: string;
    all: boolean;
    pathSet: readonly string[];
    traversal: readonly TraversalSpec[];
  };
  QueryAvailablePerfMetric: {
    perfManager: ObjectRef;
    entity: ObjectRef;
    beginTime?: string;
    endTime?: string;
    intervalId?: number;
  };
  QueryPerfCounter: {
    perfManager: ObjectRef;
    counterIds: readonly number[];
  };
  QueryPerf: {
    perfManager: ObjectRef;
    entity: ObjectRef;
    startTime?: string;
    endTime?: string;
    maxSample?: number;
    metricIds: readonly MetricId[];
    intervalId?: number;
    format: PerfFormat;
  };
};

export type SoapOperation = keyof RequestParams;

/** Fields each response carries as lists, including when the server returns none. */
export const RESPONSE_ARRAYS = {
  RetrieveServiceContent: [],
  Login: [],
  RetrieveProperties: [{ tag: 'returnval', within: ['RetrievePropertiesResponse'] }, 'propSet'],
  QueryAvailablePerfMetric: [{ tag: 'returnval', within: ['QueryAvailablePerfMetricResponse'] }],
  QueryPerfCounter: [{ tag: 'returnval', within: ['QueryPerfCounterResponse'] }],
  QueryPerf: [{ tag: 'returnval', within: ['QueryPerfResponse'] }, 'sampleInfo', 'value'],
} as const satisfies Record<SoapOperation, CardinalitySchema>;

type XmlNode = string | XmlNode[] | { [key: string]: XmlNode | undefined };

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  suppressBooleanAttributes: false,
  format: false,
});

function ref(value: ObjectRef): XmlNode {
  return { '@_type': value.kind, '#text': value.id };
}

function optional(value: string | number | undefined): XmlNode | undefined {
  return value === undefined ? undefined : String(value);
}

function traversalNode(spec: TraversalSpec): XmlNode {
  return {
    '@_xsi:type': 'TraversalSpec',
    'urn:name': spec.name,
    'urn:type': spec.type,
    'urn:path': spec.path,
    'urn:skip': String(spec.skip),
    'urn:selectSet': spec.selectSet.map((name) => ({ 'urn:name': name })),
  };
}

const bodies: { [Op in SoapOperation]: (params: RequestParams[Op]) => XmlNode } = {
  RetrieveServiceContent: () => ({
    'urn:_this': { '@_type': 'ServiceInstance', '#text': 'ServiceInstance' },
  }),
  Login: (params) => ({
    'urn:_this': ref(params.sessionManager),
    'urn:userName': params.userName,
    'urn:password': params.password,
  }),
  RetrieveProperties: (params) => ({
    'urn:_this': ref(params.propertyCollector),
    'urn:specSet': {
      'urn:propSet': {
        'urn:type': params.objectType,
        'urn:all': String(params.all),
        'urn:pathSet': [...params.pathSet],
      },
      'urn:objectSet': {
        'urn:obj': ref(params.rootFolder),
        'urn:skip': 'false',
        'urn:selectSet': params.traversal.map(traversalNode),
      },
    },
  }),
  QueryAvailablePerfMetric: (params) => ({
    'urn:_this': ref(params.perfManager),
    'urn:entity': ref(params.entity),
    'urn:beginTime': optional(params.beginTime),
    'urn:endTime': optional(params.endTime),
    'urn:intervalId': optional(params.intervalId),
  }),
  QueryPerfCounter: (params) => ({
    'urn:_this': ref(params.perfManager),
    'urn:counterId': params.counterIds.map((id) => String(id)),
  }),
  QueryPerf: (params) => ({
    'urn:_this': ref(params.perfManager),
    'urn:querySpec': {
      'urn:entity': ref(params.entity),
      'urn:startTime': optional(params.startTime),
      'urn:endTime': optional(params.endTime),
      'urn:maxSample': optional(params.maxSample),
      'urn:metricId': params.metricIds.map((metric) => ({
        'urn:counterId': String(metric.counterId),
        'urn:instance': metric.instance,
      })),
      'urn:intervalId': optional(params.intervalId),
      'urn:format': params.format,
    },
  }),
};

/**
 * Renders the SOAP envelope for one operation. Text and attribute values are entity-escaped by the builder.
 */
export function buildRequest<Op extends SoapOperation>(operation: Op, params: RequestParams[Op]): string {
  const body: (params: RequestParams[Op]) => XmlNode = bodies[operation];
  const envelope = {
    'soapenv:Envelope': {
      '@_xmlns:soapenv': SOAP_ENVELOPE_NS,
      '@_xmlns:urn': VIM25_NS,
      '@_xmlns:xsi': XSI_NS,
      'soapenv:Header': '',
      'soapenv:Body': { [`urn:${operation}`]: body(params) },
    },
  };
  return `<?xml version="1.0" encoding="UTF-8"?>${builder.build(envelope)}`;
}
