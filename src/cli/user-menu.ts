/**
 * src/cli/user-menu.ts
 *
 * WHY:
 * - Interactive text menu over UserService (create, find, list, update, delete, stats).
 * - Input checks live here: empty name/email, id format, age degrade rules.
 *
 * RULES:
 * - Each action catches its own errors, prints them, and the loop continues.
 * - End of input at any prompt ends the session.
 * - Email availability is checked before create/update (assertEmailAvailable).
 */

import type { Logger } from '../shared/logger/logger';
import { isAppError } from '../shared/errors';
import {
  applyUserChanges,
  assertEmailAvailable,
  isEmailChange,
  parseAgeInput,
  parseUserId,
  summarizeUsers,
} from '../modules/users';
import type { UserChanges, UserService } from '../modules/users';

import type { Prompt } from './prompt';
import { RULE, SEPARATOR, formatAge, formatStats, formatUserDetails } from './format';

type MenuAction = {
  key: string;
  label: string;
  run: () => Promise<void>;
};

const END_OF_INPUT = 'Input finished.';

export class UserMenu {
  private readonly actions: MenuAction[];

  constructor(
    private readonly deps: {
      users: UserService;
      prompt: Prompt;
      logger: Logger;
    },
  ) {
    this.actions = [
      { key: '1', label: 'Create user', run: () => this.createUser() },
      { key: '2', label: 'Find user by ID', run: () => this.findById() },
      { key: '3', label: 'List all users', run: () => this.listUsers() },
      { key: '4', label: 'Update user', run: () => this.updateUser() },
      { key: '5', label: 'Delete user', run: () => this.deleteUser() },
      { key: '6', label: 'Find user by email', run: () => this.findByEmail() },
      { key: '7', label: 'User statistics', run: () => this.showStats() },
    ];
  }

  async run(): Promise<void> {
    this.printWelcome();

    for (;;) {
      this.printMenu();
      const choice = await this.deps.prompt.ask('Choose an action (0-7): ');

      if (choice === null) {
        this.print('End of input reached. Exiting...');
        return;
      }

      const key = choice.trim();
      if (key === '0') {
        this.print('Exiting...');
        return;
      }

      const action = this.actions.find((a) => a.key === key);
      if (action) {
        await this.guard(action.label, action.run);
      } else {
        this.print('Invalid choice. Please try again.');
      }

      this.print();
      const pause = await this.deps.prompt.ask('Press Enter to continue...');
      if (pause === null) return;
    }
  }

  private async guard(label: string, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (err) {
      if (isAppError(err)) {
        this.deps.prompt.printError(`Error: ${err.message}`);
        return;
      }
      this.deps.logger.error('menu.action_failed', { action: label, err });
      const message = err instanceof Error ? err.message : String(err);
      this.deps.prompt.printError(`Unexpected error: ${message}`);
    }
  }

  private async createUser(): Promise<void> {
    this.header('CREATE USER');

    const name = await this.askOrStop('Name: ');
    if (name === null) return;
    if (name.trim() === '') {
      this.print('Name must not be empty.');
      return;
    }

    const rawEmail = await this.askOrStop('Email: ');
    if (rawEmail === null) return;
    const email = rawEmail.trim();
    if (email === '') {
      this.print('Email must not be empty.');
      return;
    }

    assertEmailAvailable(await this.deps.users.existsByEmail(email), email);

    const rawAge = await this.askOrStop('Age (press Enter to skip): ');
    if (rawAge === null) return;

    const ageInput = parseAgeInput(rawAge);
    if (ageInput.kind === 'invalid') {
      this.print('Invalid age. Age left unspecified.');
    }

    const user = await this.deps.users.create({
      name,
      email,
      age: ageInput.kind === 'valid' ? ageInput.age : null,
    });

    this.print('User created.');
    this.printLines(formatUserDetails(user));
  }

  private async findById(): Promise<void> {
    this.header('FIND USER BY ID');

    const id = await this.askForId('User ID: ');
    if (id === undefined) return;

    const user = await this.deps.users.findById(id);
    if (!user) {
      this.print(`User with ID ${id} not found.`);
      return;
    }

    this.print('User found:');
    this.printLines(formatUserDetails(user));
  }

  private async listUsers(): Promise<void> {
    this.header('ALL USERS');

    const users = await this.deps.users.findAll();
    if (users.length === 0) {
      this.print('No users found.');
      return;
    }

    this.print(`Users found: ${users.length}`);
    this.print(RULE);
    for (const user of users) {
      this.printLines(formatUserDetails(user));
      this.print(SEPARATOR);
    }
  }

  private async updateUser(): Promise<void> {
    this.header('UPDATE USER');

    const id = await this.askForId('User ID to update: ');
    if (id === undefined) return;

    const user = await this.deps.users.findById(id);
    if (!user) {
      this.print(`User with ID ${id} not found.`);
      return;
    }

    this.print('Current data:');
    this.printLines(formatUserDetails(user));
    this.print('Enter new values (press Enter to keep the current value):');

    const changes: UserChanges = {};

    const name = await this.askOrStop(`Name [${user.name}]: `);
    if (name === null) return;
    changes.name = name;

    const email = await this.askOrStop(`Email [${user.email}]: `);
    if (email === null) return;
    const nextEmail = email.trim();
    if (nextEmail !== '' && isEmailChange(user.email, nextEmail)) {
      assertEmailAvailable(await this.deps.users.existsByEmail(nextEmail), nextEmail);
    }
    changes.email = email;

    const rawAge = await this.askOrStop(`Age [${formatAge(user.age)}]: `);
    if (rawAge === null) return;
    const ageInput = parseAgeInput(rawAge);
    if (ageInput.kind === 'valid') {
      changes.age = ageInput.age;
    } else if (ageInput.kind === 'invalid') {
      this.print('Invalid age, value unchanged.');
    }

    const updated = await this.deps.users.update(applyUserChanges(user, changes));

    this.print('User updated.');
    this.printLines(formatUserDetails(updated));
  }

  private async deleteUser(): Promise<void> {
    this.header('DELETE USER');

    const id = await this.askForId('User ID to delete: ');
    if (id === undefined) return;

    const user = await this.deps.users.findById(id);
    if (!user) {
      this.print(`User with ID ${id} not found.`);
      return;
    }

    this.print('User to delete:');
    this.printLines(formatUserDetails(user));

    const answer = await this.askOrStop('Delete this user? (y/N): ');
    if (answer === null) return;

    const confirmation = answer.trim().toLowerCase();
    if (confirmation !== 'y' && confirmation !== 'yes') {
      this.print('Deletion cancelled.');
      return;
    }

    const deleted = await this.deps.users.delete(id);
    this.print(deleted ? 'User deleted.' : 'User could not be deleted.');
  }

  private async findByEmail(): Promise<void> {
    this.header('FIND USER BY EMAIL');

    const raw = await this.askOrStop('Email: ');
    if (raw === null) return;

    const email = raw.trim();
    if (email === '') {
      this.print('Email must not be empty.');
      return;
    }

    const user = await this.deps.users.findByEmail(email);
    if (!user) {
      this.print(`No user with email '${email}' found.`);
      return;
    }

    this.print('User found:');
    this.printLines(formatUserDetails(user));
  }

  private async showStats(): Promise<void> {
    this.header('USER STATISTICS');

    const total = await this.deps.users.count();
    const users = total > 0 ? await this.deps.users.findAll() : [];

    this.printLines(formatStats({ ...summarizeUsers(users), total }));
  }

  private async askOrStop(question: string): Promise<string | null> {
    const answer = await this.deps.prompt.ask(question);
    if (answer === null) this.print(END_OF_INPUT);
    return answer;
  }

  private async askForId(question: string): Promise<number | undefined> {
    const raw = await this.askOrStop(question);
    if (raw === null) return undefined;

    const id = parseUserId(raw);
    if (id === undefined) this.print('Invalid ID format.');
    return id;
  }

  private printWelcome(): void {
    this.printLines([RULE, '      USER MANAGEMENT CONSOLE', RULE]);
  }

  private printMenu(): void {
    this.print();
    this.printLines([RULE, '             MAIN MENU', RULE]);
    for (const action of this.actions) {
      this.print(`${action.key}. ${action.label}`);
    }
    this.print('0. Exit');
    this.print(RULE);
  }

  private header(title: string): void {
    this.print();
    this.print(`--- ${title} ---`);
  }

  private print(line = ''): void {
    this.deps.prompt.print(line);
  }

  private printLines(lines: readonly string[]): void {
    for (const line of lines) this.print(line);
  }
}
