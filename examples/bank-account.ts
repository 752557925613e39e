/**
 * Commands as classes: a bank account whose withdrawal check is off by one.
 */

import {
  BaseCommand,
  Command,
  Config,
  Gen,
  Prop,
  PropertyFailedError,
  Range,
  Seed,
  Specification,
  toProperty,
} from '../src/index.js';

class Account {
  balance = 0;

  deposit(amount: number): void {
    this.balance += amount;
  }

  withdraw(amount: number): boolean {
    // Bug: allows the balance to reach -1.
    if (amount > this.balance + 1) {
      return false;
    }
    this.balance -= amount;
    return true;
  }
}

type Ledger = number;

class Deposit extends BaseCommand<Account, Ledger> {
  constructor(private readonly amount: number) {
    super();
  }

  runActual(account: Account): Account {
    account.deposit(this.amount);
    return account;
  }

  runModel(balance: Ledger): Ledger {
    return balance + this.amount;
  }

  toString(): string {
    return `Deposit(${this.amount})`;
  }
}

class Withdraw extends BaseCommand<Account, Ledger> {
  constructor(private readonly amount: number) {
    super();
  }

  runActual(account: Account): Account {
    account.withdraw(this.amount);
    return account;
  }

  runModel(balance: Ledger): Ledger {
    return this.amount > balance ? balance : balance - this.amount;
  }

  post(account: Account, balance: Ledger): Prop {
    return Prop.of(account.balance === balance)
      .and(Prop.of(account.balance >= 0))
      .label(this.amount > 50 ? 'large withdrawal' : 'small withdrawal');
  }

  toString(): string {
    return `Withdraw(${this.amount})`;
  }
}

type AccountCommand = Command<Account, Ledger>;

const amounts = Gen.int(Range.uniform(1, 100));

const accountSpec: Specification<Account, Ledger> = {
  initialActual: () => new Account(),
  initialModel: () => 0,
  next: () =>
    Gen.frequency<AccountCommand>([
      [3, amounts.map((amount): AccountCommand => new Deposit(amount))],
      [2, amounts.map((amount): AccountCommand => new Withdraw(amount))],
    ]),
};

try {
  toProperty(accountSpec).check(
    Config.default().withTests(200),
    Seed.fromNumber(7)
  );
  console.log('No bug found');
} catch (error) {
  if (!(error instanceof PropertyFailedError)) {
    throw error;
  }
  console.log(error.message);
}
