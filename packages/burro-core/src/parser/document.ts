/**
 * Document tree
 *
 * The parsed document is stored arena-style: every text and command node
 * lives in one array owned by the DocumentTree, and fragments are ordered
 * lists of node ids. Splicing a variable therefore copies nodes into new
 * slots instead of sharing objects between reference sites.
 */

import type { SourceLocation } from '../lexer/token.js';
import type { TabDefinition, TabList } from '../tabs/tab.js';
import type { CommandName, CommandPayload } from './commands.js';

export type NodeId = number;

export type Fragment = readonly NodeId[];

export interface TextNode {
  type: 'text';
  text: string;
  location: SourceLocation;
}

/**
 * One `.key[value]` entry of a brace block
 */
export interface SubSetting {
  key: string;
  value: string;
  location: SourceLocation;
}

export interface CommandNode {
  type: 'command';
  name: CommandName;
  payload: CommandPayload;
  subSettings: readonly SubSetting[] | null;
  argument: Fragment | null;
  location: SourceLocation;
}

export type TreeNode = TextNode | CommandNode;

export type Block =
  | { type: 'paragraph'; content: Fragment; location: SourceLocation }
  | { type: 'command'; node: NodeId; location: SourceLocation };

export type VariableTable = ReadonlyMap<string, Fragment>;

export interface Document {
  tree: DocumentTree;
  blocks: readonly Block[];
  /** Value commands before `.start`; they set stack defaults */
  preamble: readonly NodeId[];
  variables: VariableTable;
  tabs: ReadonlyMap<string, TabDefinition>;
  tabLists: ReadonlyMap<string, TabList>;
}

export class DocumentTree {
  private nodes: TreeNode[] = [];

  get size(): number {
    return this.nodes.length;
  }

  add(node: TreeNode): NodeId {
    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  node(id: NodeId): TreeNode {
    const node = this.nodes[id];
    if (!node) {
      throw new Error(`DocumentTree: no node with id ${id}`);
    }
    return node;
  }

  command(id: NodeId): CommandNode {
    const node = this.node(id);
    if (node.type !== 'command') {
      throw new Error(`DocumentTree: node ${id} is not a command`);
    }
    return node;
  }

  /**
   * Deep-copy a fragment into fresh nodes
   */
  cloneFragment(fragment: Fragment): NodeId[] {
    return fragment.map(id => {
      const node = this.node(id);
      if (node.type === 'text') {
        return this.add({ ...node });
      }
      return this.add({
        ...node,
        argument: node.argument ? this.cloneFragment(node.argument) : null,
      });
    });
  }

  /**
   * Concatenated text of a fragment, or null if it holds any command
   */
  plainText(fragment: Fragment): string | null {
    let text = '';
    for (const id of fragment) {
      const node = this.node(id);
      if (node.type !== 'text') {
        return null;
      }
      text += node.text;
    }
    return text;
  }
}
