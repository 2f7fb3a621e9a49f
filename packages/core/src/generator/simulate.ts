import type { ValueHeap } from '../vm/heap.js';
import type { VmState } from '../vm/state.js';
import { NONE, type Handle, type StackValue, type ValueOf } from '../vm/values.js';
import type { Instruction } from './instruction.js';

/** Marker and underflow accounting for one applied instruction. */
export interface SimulationEffect {
  marksPushed: number;
  marksPopped: number;
  /** Pops that found an empty stack; zero unless mutation broke structure. */
  underflows: number;
}

const PERSISTENT_PLACEHOLDER = 'persistent_object';

class Machine {
  readonly effect: SimulationEffect = {
    marksPushed: 0,
    marksPopped: 0,
    underflows: 0,
  };

  constructor(private readonly state: VmState) {}

  get heap(): ValueHeap {
    return this.state.heap;
  }

  push(value: StackValue): Handle {
    if (value.kind === 'mark') this.effect.marksPushed += 1;
    return this.state.pushValue(value);
  }

  pushHandle(handle: Handle): void {
    this.state.stack.push(handle);
  }

  pop(): Handle {
    const handle = this.state.stack.pop();
    if (handle === undefined) {
      this.effect.underflows += 1;
      return this.heap.alloc(NONE);
    }
    if (this.heap.kindOf(handle) === 'mark') this.effect.marksPopped += 1;
    return handle;
  }

  popMarked(): Handle[] {
    const group = this.state.stack.popToMark();
    if (group === undefined) {
      this.effect.underflows += 1;
      return [];
    }
    this.effect.marksPopped += 1;
    return group;
  }

  peek(): Handle | undefined {
    return this.state.stack.peek();
  }
}

/**
 * Apply the abstract effect of an instruction that was just written.
 * Containers are mutated in place, so every holder of the handle sees it.
 */
export function simulate(state: VmState, instr: Instruction): SimulationEffect {
  const vm = new Machine(state);
  const heap = vm.heap;

  switch (instr.op) {
    case 'INT':
    case 'BININT':
    case 'BININT1':
    case 'BININT2':
    case 'LONG':
    case 'LONG1':
    case 'LONG4':
      vm.push({ kind: 'int', value: instr.value });
      break;
    case 'FLOAT':
    case 'BINFLOAT':
      vm.push({ kind: 'float', value: instr.value });
      break;
    case 'STRING':
    case 'UNICODE':
    case 'SHORT_BINUNICODE':
    case 'BINUNICODE':
    case 'BINUNICODE8':
      vm.push({ kind: 'text', value: instr.value });
      break;
    case 'BINSTRING':
    case 'SHORT_BINSTRING':
    case 'BINBYTES':
    case 'SHORT_BINBYTES':
    case 'BINBYTES8':
      vm.push({ kind: 'bytes', value: instr.value });
      break;
    case 'BYTEARRAY8':
      vm.push({ kind: 'bytearray', value: instr.value });
      break;
    case 'NONE':
      vm.push({ kind: 'none' });
      break;
    case 'NEWTRUE':
    case 'NEWFALSE':
      vm.push({ kind: 'bool', value: instr.op === 'NEWTRUE' });
      break;

    case 'EMPTY_LIST':
      vm.push({ kind: 'list', items: [] });
      break;
    case 'EMPTY_TUPLE':
      vm.push({ kind: 'tuple', items: [] });
      break;
    case 'EMPTY_DICT':
      vm.push({ kind: 'dict', entries: [] });
      break;
    case 'EMPTY_SET':
      vm.push({ kind: 'set', members: [] });
      break;

    case 'MARK':
      vm.push({ kind: 'mark' });
      break;
    case 'POP':
      vm.pop();
      break;
    case 'POP_MARK':
      vm.popMarked();
      break;
    case 'DUP': {
      const top = vm.peek();
      if (top !== undefined && heap.kindOf(top) !== 'mark') vm.pushHandle(top);
      break;
    }

    case 'APPEND': {
      const item = vm.pop();
      const list = vm.peek();
      const target = list === undefined ? undefined : heap.as(list, 'list');
      target?.items.push(item);
      break;
    }
    case 'APPENDS': {
      const items = vm.popMarked();
      const list = vm.peek();
      const target = list === undefined ? undefined : heap.as(list, 'list');
      target?.items.push(...items);
      break;
    }
    case 'LIST':
      vm.push({ kind: 'list', items: vm.popMarked() });
      break;
    case 'TUPLE':
      vm.push({ kind: 'tuple', items: vm.popMarked() });
      break;
    case 'TUPLE1':
    case 'TUPLE2':
    case 'TUPLE3': {
      const arity = instr.op === 'TUPLE1' ? 1 : instr.op === 'TUPLE2' ? 2 : 3;
      const items: Handle[] = [];
      for (let i = 0; i < arity; i++) items.unshift(vm.pop());
      vm.push({ kind: 'tuple', items });
      break;
    }
    case 'DICT': {
      const group = vm.popMarked();
      const dict: ValueOf<'dict'> = { kind: 'dict', entries: [] };
      setEntries(heap, dict, group);
      vm.push(dict);
      break;
    }
    case 'SETITEM': {
      const value = vm.pop();
      const key = vm.pop();
      const top = vm.peek();
      const dict = top === undefined ? undefined : heap.as(top, 'dict');
      if (dict) heap.dictSet(dict, key, value);
      break;
    }
    case 'SETITEMS': {
      const group = vm.popMarked();
      const top = vm.peek();
      const dict = top === undefined ? undefined : heap.as(top, 'dict');
      if (dict) setEntries(heap, dict, group);
      break;
    }
    case 'ADDITEMS': {
      const group = vm.popMarked();
      const top = vm.peek();
      const set = top === undefined ? undefined : heap.as(top, 'set');
      if (set) for (const member of group) heap.setAdd(set, member);
      break;
    }
    case 'FROZENSET':
      vm.push({ kind: 'frozenset', members: heap.uniqueMembers(vm.popMarked()) });
      break;

    case 'GLOBAL':
      vm.push({ kind: 'global', module: instr.module, name: instr.name });
      break;
    case 'STACK_GLOBAL': {
      const name = vm.pop();
      const module = vm.pop();
      vm.push({
        kind: 'global',
        module: heap.as(module, 'text')?.value ?? 'builtins',
        name: heap.as(name, 'text')?.value ?? 'object',
      });
      break;
    }
    case 'REDUCE':
    case 'NEWOBJ': {
      const args = vm.pop();
      const callable = vm.pop();
      vm.push({ kind: 'instance', callable: unwrapCallable(heap, callable), args });
      break;
    }
    case 'NEWOBJ_EX': {
      vm.pop(); // kwargs
      const args = vm.pop();
      const callable = vm.pop();
      vm.push({ kind: 'instance', callable: unwrapCallable(heap, callable), args });
      break;
    }
    case 'BUILD': {
      const stateArg = vm.pop();
      const top = vm.peek();
      const instance = top === undefined ? undefined : heap.as(top, 'instance');
      if (instance) instance.args = stateArg;
      break;
    }
    case 'INST': {
      const args = heap.alloc({ kind: 'tuple', items: vm.popMarked() });
      const callable = heap.alloc({ kind: 'global', module: instr.module, name: instr.name });
      vm.push({ kind: 'instance', callable, args });
      break;
    }
    case 'OBJ': {
      const [cls, ...rest] = vm.popMarked();
      const args = heap.alloc({ kind: 'tuple', items: rest });
      vm.push({
        kind: 'instance',
        callable: cls === undefined ? heap.alloc(NONE) : unwrapCallable(heap, cls),
        args,
      });
      break;
    }

    case 'PUT':
    case 'BINPUT':
    case 'LONG_BINPUT': {
      const top = vm.peek();
      if (top !== undefined && heap.kindOf(top) !== 'mark') {
        state.memo.put(instr.index, top);
      }
      break;
    }
    case 'MEMOIZE': {
      const top = vm.peek();
      if (top !== undefined && heap.kindOf(top) !== 'mark') {
        state.memo.put(state.memo.size, top);
      }
      break;
    }
    case 'GET':
    case 'BINGET':
    case 'LONG_BINGET': {
      const stored = state.memo.get(instr.index);
      if (stored === undefined) {
        vm.push({ kind: 'none' });
      } else {
        vm.pushHandle(heap.clone(stored));
      }
      break;
    }

    case 'PERSID':
      vm.push({ kind: 'text', value: instr.id });
      break;
    case 'BINPERSID':
      vm.pop();
      vm.push({ kind: 'text', value: PERSISTENT_PLACEHOLDER });
      break;
    case 'EXT1':
    case 'EXT2':
    case 'EXT4':
      vm.push({
        kind: 'callable',
        target: heap.alloc({ kind: 'global', module: 'builtins', name: 'object' }),
      });
      break;
    case 'NEXT_BUFFER':
      vm.push({ kind: 'bytes', value: new Uint8Array(0) });
      break;

    case 'PROTO':
      state.headerEmitted = true;
      break;
    case 'READONLY_BUFFER':
    case 'FRAME':
    case 'STOP':
      break;
  }

  return vm.effect;
}

/** A Callable wrapper stands for its target; anything else is itself. */
function unwrapCallable(heap: ValueHeap, handle: Handle): Handle {
  return heap.as(handle, 'callable')?.target ?? handle;
}

/** Consume a flat key, value, key, value group; an odd tail is dropped. */
function setEntries(
  heap: ValueHeap,
  dict: ValueOf<'dict'>,
  group: readonly Handle[]
): void {
  for (let i = 0; i + 1 < group.length; i += 2) {
    const key = group[i];
    const value = group[i + 1];
    if (key !== undefined && value !== undefined) heap.dictSet(dict, key, value);
  }
}
