import { FormField, OperationInput } from '../../core/entities/Operation.js';
import { ITicketClient } from '../../core/interfaces/ITicketClient.js';
import { ERROR_OPTION_VALUE, loadOptions, parseId, parseTags, readString } from './formInput.js';
import { readStringList, readText } from './results.js';
import { ViewBatchVariant } from './ViewBatchOperation.js';

const TAGS_FIELD: FormField = {
  name: 'tags',
  label: 'Tags',
  type: 'text',
  required: true,
  placeholder: 'urgent, needs-review',
  helpText: 'Comma-separated list of tags',
};

function validateTags(input: OperationInput): string | null {
  return parseTags(input).length === 0 ? 'Please enter at least one tag' : null;
}

function tagExportRows(data: Record<string, unknown>) {
  return [['Tags', readStringList(data, 'tags').join(', ')]];
}

export const tagAddVariant: ViewBatchVariant = {
  metadata: {
    name: 'Add Tags to View',
    slug: 'tag-add',
    description: 'Add one or more tags to every ticket in a view',
    category: 'Tags',
    requiresAdmin: false,
  },
  actionLabel: 'added tags to',
  fields: async () => [TAGS_FIELD],
  validate: validateTags,
  prepare: async (input) => {
    const tags = parseTags(input);
    return { mutation: { kind: 'add-tags', tags }, context: { tags } };
  },
  exportRows: tagExportRows,
};

export const tagRemoveVariant: ViewBatchVariant = {
  metadata: {
    name: 'Remove Tags from View',
    slug: 'tag-remove',
    description: 'Remove one or more tags from every ticket in a view',
    category: 'Tags',
    requiresAdmin: false,
  },
  actionLabel: 'removed tags from',
  fields: async () => [TAGS_FIELD],
  validate: validateTags,
  prepare: async (input) => {
    const tags = parseTags(input);
    return { mutation: { kind: 'remove-tags', tags }, context: { tags } };
  },
  exportRows: tagExportRows,
};

async function macroOptions(client: ITicketClient | null) {
  return loadOptions('macros', async () => {
    if (!client) throw new Error('Zendesk client not configured');
    const macros = await client.getMacros();
    return macros
      .filter((macro) => macro.active)
      .map((macro) => ({ value: String(macro.id), label: `${macro.title} (ID: ${macro.id})` }));
  });
}

export const applyMacroVariant: ViewBatchVariant = {
  metadata: {
    name: 'Apply Macro to View',
    slug: 'apply-macro-to-view',
    description: 'Apply a macro to all tickets in a specified view with safety controls',
    category: 'Macros',
    requiresAdmin: true,
  },
  actionLabel: 'applied macro to',
  fields: async (client) => [
    {
      name: 'macro_id',
      label: 'Select Macro',
      type: 'select',
      required: true,
      options: await macroOptions(client),
      helpText: 'Choose the macro to apply to all tickets in the view',
    },
  ],
  validate: (input) => {
    const macroId = readString(input, 'macro_id');
    if (!macroId) return 'Please select a macro';
    if (macroId === ERROR_OPTION_VALUE) return 'Unable to load macros. Please check your Zendesk configuration.';
    if (parseId(macroId) === null) return 'Macro ID must be a valid number';
    return null;
  },
  prepare: async (input, client) => {
    const macroId = Number(readString(input, 'macro_id'));
    const macros = await client.getMacros();
    const macroName = macros.find((macro) => macro.id === macroId)?.title ?? `Macro ${macroId}`;
    return { mutation: { kind: 'apply-macro', macroId }, context: { macroId, macroName } };
  },
  exportRows: (data) => [['Macro', readText(data, 'macroName') ?? readText(data, 'macroId') ?? 'N/A']],
};
