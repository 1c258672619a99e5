/**
 * MCP Tools
 * 讀取工具與寫入工具；寫入一律經過客戶端的 Mode Gate
 */

import { z } from 'zod';
import { defineTool, ToolRegistry } from './registry.js';
import type { ClientProvider, ToolDefinition } from './registry.js';
import {
  display,
  renderAssignments,
  renderAvailability,
  renderEvent,
  renderEvents,
  renderLocations,
  renderMembers,
  renderOpponents,
  renderTeam,
  renderTeams,
  renderUpdated,
} from './render.js';
import type { StructuredLogger } from '../lib/logger.js';
import { AVAILABILITY_STATUSES } from '../types/resources.js';
import type { FieldValue } from '../types/envelope.js';

const id = (what: string) => z.number().int().positive().describe(what);

function hasFields(fields: Record<string, FieldValue | undefined>): boolean {
  return Object.values(fields).some((value) => value !== undefined);
}

const NO_FIELDS = 'No fields provided to update.';

// 讀取工具

const readTools: ToolDefinition[] = [
  defineTool({
    name: 'list_teams',
    description: 'List all teams accessible to the authenticated user.',
    readOnly: true,
    input: { user_id: id('Optional user ID to filter teams').optional() },
    run: async (client, { user_id }) => renderTeams(await client.teams.searchAll({ user_id })),
  }),

  defineTool({
    name: 'get_team_details',
    description: 'Get detailed information about a specific team.',
    readOnly: true,
    input: { team_id: id('The team ID') },
    run: async (client, { team_id }) => renderTeam(await client.teams.get(team_id)),
  }),

  defineTool({
    name: 'list_events',
    description: 'List all events for a team.',
    readOnly: true,
    input: { team_id: id('The team ID') },
    run: async (client, { team_id }) => renderEvents(team_id, await client.events.searchAll({ team_id })),
  }),

  defineTool({
    name: 'get_event_details',
    description: 'Get detailed information about a specific event.',
    readOnly: true,
    input: { event_id: id('The event ID') },
    run: async (client, { event_id }) => renderEvent(await client.events.get(event_id)),
  }),

  defineTool({
    name: 'list_members',
    description: 'List all members of a team.',
    readOnly: true,
    input: { team_id: id('The team ID') },
    run: async (client, { team_id }) => renderMembers(team_id, await client.members.searchAll({ team_id })),
  }),

  defineTool({
    name: 'get_event_availability',
    description: 'Get member availability responses for a specific event.',
    readOnly: true,
    input: { event_id: id('The event ID') },
    run: async (client, { event_id }) =>
      renderAvailability(event_id, await client.availabilities.searchAll({ event_id })),
  }),

  defineTool({
    name: 'list_assignments',
    description: 'List assignments (tasks) for an event.',
    readOnly: true,
    input: { event_id: id('The event ID') },
    run: async (client, { event_id }) =>
      renderAssignments(event_id, await client.assignments.searchAll({ event_id })),
  }),

  defineTool({
    name: 'list_locations',
    description: 'List all locations for a team.',
    readOnly: true,
    input: { team_id: id('The team ID') },
    run: async (client, { team_id }) =>
      renderLocations(team_id, await client.locations.searchAll({ team_id })),
  }),

  defineTool({
    name: 'list_opponents',
    description: 'List all opponents for a team.',
    readOnly: true,
    input: { team_id: id('The team ID') },
    run: async (client, { team_id }) =>
      renderOpponents(team_id, await client.opponents.searchAll({ team_id })),
  }),

  defineTool({
    name: 'get_api_version',
    description: 'Show the TeamSnap API version and whether this server allows writes.',
    readOnly: true,
    input: {},
    run: async (client) => {
      const version = await client.getApiVersion();
      return [`TeamSnap API version: ${version ?? 'not reported'}`, `Mode: ${client.mode}`].join('\n');
    },
  }),
];

// 寫入工具

const writeTools: ToolDefinition[] = [
  defineTool({
    name: 'create_event',
    description: 'Create a new event for a team.',
    readOnly: false,
    input: {
      team_id: id('The team ID'),
      name: z.string().min(1).describe('Event name'),
      start_date: z.string().min(1).describe('Start date/time in ISO format (e.g. "2025-01-15T14:00:00Z")'),
      is_game: z.boolean().default(false).describe('Whether this is a game (true) or practice/other (false)'),
      location_id: id('Optional location ID').optional(),
      opponent_id: id('Optional opponent ID (for games)').optional(),
      notes: z.string().optional().describe('Optional notes/description'),
    },
    run: async (client, args) => {
      const { data } = await client.events.create(args);
      const lines = [
        `✅ Successfully created ${args.is_game ? 'game' : 'event'}: ${args.name}`,
        '',
        `Event ID: ${display(data.id)}`,
        `Start: ${args.start_date}`,
      ];
      if (args.location_id !== undefined) lines.push(`Location ID: ${args.location_id}`);
      if (args.notes) lines.push(`Notes: ${args.notes}`);
      return lines.join('\n');
    },
  }),

  defineTool({
    name: 'update_event',
    description: 'Update an existing event.',
    readOnly: false,
    input: {
      event_id: id('The event ID to update'),
      name: z.string().min(1).optional().describe('Optional new event name'),
      start_date: z.string().min(1).optional().describe('Optional new start date/time in ISO format'),
      location_id: id('Optional new location ID').optional(),
      notes: z.string().optional().describe('Optional new notes'),
    },
    run: async (client, { event_id, ...fields }) => {
      if (!hasFields(fields)) return NO_FIELDS;
      await client.events.update(event_id, fields);
      return renderUpdated('event', event_id, fields);
    },
  }),

  defineTool({
    name: 'delete_event',
    description: 'Delete an event.',
    readOnly: false,
    input: { event_id: id('The event ID to delete') },
    run: async (client, { event_id }) => {
      await client.events.delete(event_id);
      return `✅ Successfully deleted event ${event_id}`;
    },
  }),

  defineTool({
    name: 'create_member',
    description: 'Add a new member to a team.',
    readOnly: false,
    input: {
      team_id: id('The team ID'),
      first_name: z.string().min(1).describe("Member's first name"),
      last_name: z.string().min(1).describe("Member's last name"),
      email: z.string().optional().describe('Optional email address'),
      phone: z.string().optional().describe('Optional phone number'),
    },
    run: async (client, args) => {
      const { data } = await client.members.create(args);
      const lines = [
        `✅ Successfully added member: ${args.first_name} ${args.last_name}`,
        '',
        `Member ID: ${display(data.id)}`,
      ];
      if (args.email) lines.push(`Email: ${args.email}`);
      if (args.phone) lines.push(`Phone: ${args.phone}`);
      return lines.join('\n');
    },
  }),

  defineTool({
    name: 'update_member',
    description: 'Update an existing team member.',
    readOnly: false,
    input: {
      member_id: id('The member ID to update'),
      first_name: z.string().min(1).optional().describe('Optional new first name'),
      last_name: z.string().min(1).optional().describe('Optional new last name'),
      email: z.string().optional().describe('Optional new email'),
      phone: z.string().optional().describe('Optional new phone number'),
    },
    run: async (client, { member_id, ...fields }) => {
      if (!hasFields(fields)) return NO_FIELDS;
      await client.members.update(member_id, fields);
      return renderUpdated('member', member_id, fields);
    },
  }),

  defineTool({
    name: 'delete_member',
    description: 'Remove a member from a team.',
    readOnly: false,
    input: { member_id: id('The member ID to delete') },
    run: async (client, { member_id }) => {
      await client.members.delete(member_id);
      return `✅ Successfully removed member ${member_id}`;
    },
  }),

  defineTool({
    name: 'update_availability',
    description: "Update a member's availability for an event.",
    readOnly: false,
    input: {
      availability_id: id('The availability ID to update'),
      status: z.string().trim().toLowerCase().pipe(z.enum(AVAILABILITY_STATUSES)).describe('New status'),
    },
    run: async (client, { availability_id, status }) => {
      await client.availabilities.update(availability_id, { status });
      return `✅ Successfully updated availability ${availability_id}\nNew status: ${status}`;
    },
  }),

  defineTool({
    name: 'create_assignment',
    description: 'Create a new assignment (task) for an event.',
    readOnly: false,
    input: {
      event_id: id('The event ID'),
      member_id: id('The member ID to assign to'),
      description: z.string().min(1).describe('Description of the assignment'),
    },
    run: async (client, args) => {
      const { data } = await client.assignments.create(args);
      return [
        '✅ Successfully created assignment',
        '',
        `Assignment ID: ${display(data.id)}`,
        `Description: ${args.description}`,
        `Assigned to Member ID: ${args.member_id}`,
        `For Event ID: ${args.event_id}`,
      ].join('\n');
    },
  }),

  defineTool({
    name: 'delete_assignment',
    description: 'Delete an assignment.',
    readOnly: false,
    input: { assignment_id: id('The assignment ID to delete') },
    run: async (client, { assignment_id }) => {
      await client.assignments.delete(assignment_id);
      return `✅ Successfully deleted assignment ${assignment_id}`;
    },
  }),

  defineTool({
    name: 'create_location',
    description: 'Create a new location for a team.',
    readOnly: false,
    input: {
      team_id: id('The team ID'),
      name: z.string().min(1).describe('Location name'),
      address: z.string().optional().describe('Optional address'),
    },
    run: async (client, args) => {
      const { data } = await client.locations.create(args);
      const lines = [`✅ Successfully created location: ${args.name}`, '', `Location ID: ${display(data.id)}`];
      if (args.address) lines.push(`Address: ${args.address}`);
      return lines.join('\n');
    },
  }),

  defineTool({
    name: 'delete_location',
    description: 'Delete a location.',
    readOnly: false,
    input: { location_id: id('The location ID to delete') },
    run: async (client, { location_id }) => {
      await client.locations.delete(location_id);
      return `✅ Successfully deleted location ${location_id}`;
    },
  }),
];

/**
 * 建立包含所有工具的註冊表
 */
export function buildToolRegistry(getClient: ClientProvider, logger?: StructuredLogger): ToolRegistry {
  const registry = new ToolRegistry(getClient, logger);
  for (const tool of [...readTools, ...writeTools]) {
    registry.register(tool);
  }
  return registry;
}
