import { Command, Option } from 'commander';
import { confirm } from '@inquirer/prompts';
import { resolve } from 'path';
import { EXPORT_FORMATS, type ExportFormat } from '../store/append-log.js';
import { ProjectNotFoundError } from '../utils/errors.js';
import type { Project, ProjectStore } from '../store/projects.js';
import { contextFor, fail, printEntryLine } from './shared.js';

interface CreateOptions {
  description?: string;
  tags?: string[];
}

interface ExportOptions {
  promptsOnly?: boolean;
  format: ExportFormat;
}

interface DeleteOptions {
  yes?: boolean;
}

function requireProject(projects: ProjectStore, name: string): Project {
  const project = projects.get(name);
  if (!project) {
    throw new ProjectNotFoundError(name);
  }
  return project;
}

export const projectCommand = new Command('project').description('Manage project collections');

projectCommand
  .command('list')
  .description('List all projects')
  .action(async (_options: unknown, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const summaries = projects.list();
      if (summaries.length === 0) {
        console.log('No projects found.');
        return;
      }

      console.log(`\nFound ${summaries.length} projects:\n`);
      for (const project of summaries) {
        console.log(`  ${project.name}`);
        if (project.description) {
          console.log(`    ${project.description}`);
        }
        console.log(`    Created: ${project.created || 'Unknown'} | Prompts: ${project.promptCount}`);
        if (project.tags.length > 0) {
          console.log(`    Tags: ${project.tags.join(', ')}`);
        }
        console.log('');
      }
    } catch (error) {
      fail(error);
    }
  });

projectCommand
  .command('create')
  .description('Create a project')
  .argument('<name>', 'Project name')
  .option('-d, --description <text>', 'Project description')
  .option('-t, --tags <tags...>', 'Tags to attach')
  .action(async (name: string, options: CreateOptions, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const project = projects.create(name, options);
      console.log(`Created project: ${project.name} (${project.dir})`);
    } catch (error) {
      fail(error);
    }
  });

projectCommand
  .command('show')
  .description('Show project prompts')
  .argument('<name>', 'Project name')
  .action(async (name: string, _options: unknown, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const project = requireProject(projects, name);
      const prompts = project.prompts();
      const { description, tags } = project.metadata;

      console.log(`\nProject: ${project.name}`);
      console.log(`Description: ${description || 'N/A'}`);
      if (tags.length > 0) {
        console.log(`Tags: ${tags.join(', ')}`);
      }
      console.log(`Prompts: ${prompts.length}\n`);
      prompts.forEach((prompt, i) => printEntryLine(i, prompt));
    } catch (error) {
      fail(error);
    }
  });

projectCommand
  .command('describe')
  .description('Set the project description')
  .argument('<name>', 'Project name')
  .argument('<description>', 'New description')
  .action(async (name: string, description: string, _options: unknown, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const project = requireProject(projects, name);
      if (!project.setDescription(description)) {
        fail(new Error('Failed to save project metadata'));
        return;
      }
      console.log(`Description of ${project.name} updated`);
    } catch (error) {
      fail(error);
    }
  });

projectCommand
  .command('tag')
  .description('Add tags to a project')
  .argument('<name>', 'Project name')
  .argument('<tags...>', 'Tags to add')
  .action(async (name: string, tags: string[], _options: unknown, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const project = requireProject(projects, name);
      if (!project.addTags(...tags)) {
        fail(new Error('Failed to save project metadata'));
        return;
      }
      console.log(`Tags: ${project.metadata.tags.join(', ')}`);
    } catch (error) {
      fail(error);
    }
  });

projectCommand
  .command('untag')
  .description('Remove tags from a project')
  .argument('<name>', 'Project name')
  .argument('<tags...>', 'Tags to remove')
  .action(async (name: string, tags: string[], _options: unknown, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const project = requireProject(projects, name);
      if (!project.removeTags(...tags)) {
        fail(new Error('Failed to save project metadata'));
        return;
      }
      console.log(`Tags: ${project.metadata.tags.join(', ') || '(none)'}`);
    } catch (error) {
      fail(error);
    }
  });

projectCommand
  .command('export')
  .description('Export project metadata and prompts as one JSON file')
  .argument('<name>', 'Project name')
  .argument('<output>', 'Output file')
  .option('--prompts-only', 'Write only the prompts, without metadata')
  .addOption(
    new Option('-f, --format <format>', 'with --prompts-only: array (one JSON document) or lines (JSONL)')
      .choices(EXPORT_FORMATS)
      .default('array'),
  )
  .action(async (name: string, output: string, options: ExportOptions, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const target = resolve(output);
      const project = requireProject(projects, name);
      const count = options.promptsOnly ? project.exportPrompts(target, options.format) : project.export(target);
      console.log(`Exported ${count} prompts to ${target}`);
    } catch (error) {
      fail(error);
    }
  });

projectCommand
  .command('delete')
  .description('Delete a project and its prompts')
  .argument('<name>', 'Project name')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (name: string, options: DeleteOptions, command: Command) => {
    try {
      const { projects } = await contextFor(command);
      const project = requireProject(projects, name);
      const proceed =
        options.yes ||
        (await confirm({ message: `Delete project '${project.name}' and all its prompts?`, default: false }));
      if (!proceed) {
        console.log('Cancelled');
        return;
      }
      if (!projects.delete(name)) {
        fail(new Error(`Failed to delete project '${project.name}'`));
        return;
      }
      console.log(`Deleted project: ${project.name}`);
    } catch (error) {
      fail(error);
    }
  });
