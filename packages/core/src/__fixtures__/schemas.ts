/**
 * Small schema documents shared by the pipeline tests.
 */

const ref = (name: string): { $ref: string } => ({ $ref: `#/definitions/${name}` });

/** Pod requires spec, spec requires containers */
export const POD_SCHEMA = {
  definitions: {
    Pod: {
      properties: { spec: ref('PodSpec') },
      required: ['spec'],
    },
    PodSpec: {
      properties: { containers: { type: 'array', items: ref('Container') } },
      required: ['containers'],
    },
    Container: {
      properties: { name: { type: 'string' }, image: { type: 'string' } },
      required: ['name'],
    },
  },
};

/** Cut-down core/v1 Pod with maps, enums, an int-or-string union and prose constraints */
export const KUBE_SCHEMA = {
  definitions: {
    'io.k8s.api.core.v1.Pod': {
      type: 'object',
      description: 'Pod is a collection of containers that can run on a host.',
      'x-kubernetes-group-version-kind': [{ group: '', version: 'v1', kind: 'Pod' }],
      properties: {
        apiVersion: { type: 'string' },
        kind: { type: 'string' },
        metadata: ref('io.k8s.apimachinery.pkg.apis.meta.v1.ObjectMeta'),
        spec: ref('io.k8s.api.core.v1.PodSpec'),
      },
    },
    'io.k8s.apimachinery.pkg.apis.meta.v1.ObjectMeta': {
      type: 'object',
      properties: {
        name: { type: 'string' },
        labels: { type: 'object', additionalProperties: { type: 'string' } },
      },
    },
    'io.k8s.api.core.v1.PodSpec': {
      type: 'object',
      required: ['containers'],
      properties: {
        containers: { type: 'array', items: ref('io.k8s.api.core.v1.Container') },
        restartPolicy: { type: 'string', enum: ['Always', 'OnFailure', 'Never'] },
        hostNetwork: { type: 'boolean' },
        nodeName: { type: 'string' },
        nodeSelector: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Selector which must match a node. Cannot be set when `nodeName` is set.',
        },
      },
    },
    'io.k8s.api.core.v1.Container': {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string' },
        image: { type: 'string' },
        ports: { type: 'array', items: ref('io.k8s.api.core.v1.ContainerPort') },
      },
    },
    'io.k8s.api.core.v1.ContainerPort': {
      type: 'object',
      required: ['containerPort'],
      properties: {
        containerPort: { type: 'integer' },
        protocol: { type: 'string', description: 'Protocol for port. Defaults to "TCP".' },
        targetPort: ref('io.k8s.apimachinery.pkg.util.intstr.IntOrString'),
      },
    },
    'io.k8s.apimachinery.pkg.util.intstr.IntOrString': {
      oneOf: [{ type: 'string' }, { type: 'integer' }],
    },
  },
};

/** Two kinds holding the same metadata object */
export const SHARED_META_SCHEMA = {
  definitions: {
    A: { properties: { meta: ref('Meta'), size: { type: 'integer' } } },
    B: { properties: { meta: ref('Meta') }, required: ['meta'] },
    Meta: {
      properties: {
        name: { type: 'string' },
        labels: { type: 'object', additionalProperties: { type: 'string' } },
      },
      required: ['name'],
    },
  },
};
